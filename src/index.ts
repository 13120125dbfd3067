#!/usr/bin/env node

import { BranchSyncService } from "./services/branch-sync.service";
import { GitService } from "./services/git.service";
import { Logger } from "./services/logger.service";
import { parseArguments } from "./utils/cli";

import type { Config } from "./types";

async function main(): Promise<void> {
  const options = parseArguments();

  const config: Config = {
    cwd: process.cwd(),
    verbose: options.verbose,
    color: Boolean(process.stdout.isTTY),
  };
  const logger = new Logger({ debug: config.verbose, color: config.color });

  const gitService = new GitService({ ...config, logger });
  const syncService = new BranchSyncService(gitService, { logger, color: config.color });

  try {
    await syncService.sync();
  } catch (error) {
    logger.error("error:", error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
