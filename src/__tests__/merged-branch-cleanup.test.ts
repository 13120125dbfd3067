import { beforeEach, describe, expect, it } from "vitest";

import { BranchSyncService } from "../services/branch-sync.service";

import { FakeGitBackend } from "./helpers/fake-git-backend";
import { createCapturingLogger } from "./test-utils";

import type { CapturingLogger } from "./test-utils";

describe("Cleanup of branches whose upstream was deleted", () => {
  let repo: FakeGitBackend;
  let output: CapturingLogger;
  let service: BranchSyncService;
  let base: string;

  beforeEach(() => {
    repo = new FakeGitBackend();
    output = createCapturingLogger();
    service = new BranchSyncService(repo, { logger: output.logger });

    base = repo.commit("c0", [], { "README.md": "# demo\n" });
    repo.addRemote("origin");
    repo.seedRemote("origin", { main: base });
    repo.setLocalBranch("main", base, { remote: "origin" });
    repo.checkout("main");
  });

  /** A branch that was pushed, tracked, and then removed from the remote. */
  function goneBranch(name: string, tip: string): void {
    repo.seedRemote("origin", { [name]: tip });
    repo.setLocalBranch(name, tip, { remote: "origin" });
    repo.deleteRemoteBranch("origin", name);
  }

  it("deletes a branch merged with a regular merge", async () => {
    const topic = repo.commit("t1", [base], { "README.md": "# demo\n", "a.txt": "a\n" });
    const mergeCommit = repo.commit("m1", [base, topic], { "README.md": "# demo\n", "a.txt": "a\n" });
    goneBranch("topic", topic);
    repo.pushRemote("origin", "main", mergeCommit);

    const report = await service.sync();

    expect(report.results).toContainEqual({
      branch: "topic",
      verdict: { kind: "deleted", fromShortId: "t100000", reason: "merged" },
    });
    expect(output.messages("info")).toEqual([
      "Updated branch main (was c000000).",
      "Deleted branch topic (was t100000).",
    ]);
    expect(await repo.listLocalBranches()).toEqual(["main"]);
    expect(repo.calls.filter((call) => call.startsWith("createDanglingCommit"))).toEqual([]);
  });

  it("deletes a branch whose single commit was squash-merged", async () => {
    const topic = repo.commit("t1", [base], { "README.md": "# demo\n", "a.txt": "a\n" });
    const other = repo.commit("m1", [base], { "README.md": "# demo\n", "b.txt": "b\n" });
    const squash = repo.commit("m2", [other], { "README.md": "# demo\n", "a.txt": "a\n", "b.txt": "b\n" });
    goneBranch("topic", topic);
    repo.pushRemote("origin", "main", squash);

    const report = await service.sync();

    expect(report.results).toContainEqual({
      branch: "topic",
      verdict: { kind: "deleted", fromShortId: "t100000", reason: "squash-merged" },
    });
    expect(output.messages("info")).toContain("Deleted branch topic (was t100000).");
    expect(await repo.listLocalBranches()).toEqual(["main"]);
  });

  it("keeps an unrelated branch and warns that it is not merged", async () => {
    const topic = repo.commit("t1", [base], { "README.md": "# demo\n", "a.txt": "a\n" });
    const other = repo.commit("m1", [base], { "README.md": "# demo\n", "b.txt": "b\n" });
    goneBranch("topic", topic);
    repo.pushRemote("origin", "main", other);

    const report = await service.sync();

    expect(report.results).toContainEqual({ branch: "topic", verdict: { kind: "not-merged" } });
    expect(output.messages("warn")).toEqual([
      "warning: 'topic' was deleted on origin, but appears not merged into 'main'",
    ]);
    expect(repo.branchCommit("topic")).toBe(topic);
  });

  it("keeps the branch when the squash check cannot complete", async () => {
    const topic = repo.commit("t1", [base], { "README.md": "# demo\n", "a.txt": "a\n" });
    const squash = repo.commit("m1", [base], { "README.md": "# demo\n", "a.txt": "a\n" });
    goneBranch("topic", topic);
    repo.pushRemote("origin", "main", squash);
    repo.failOn.add("createDanglingCommit");

    const report = await service.sync();

    expect(report.results).toContainEqual({ branch: "topic", verdict: { kind: "not-merged" } });
    expect(repo.branchCommit("topic")).toBe(topic);
  });

  it("switches to the default branch before deleting the checked-out branch", async () => {
    const topic = repo.commit("t1", [base], { "README.md": "# demo\n", "a.txt": "a\n" });
    goneBranch("topic", topic);
    repo.pushRemote("origin", "main", topic);
    repo.checkout("topic");

    await service.sync();

    const switchIndex = repo.calls.indexOf("switchCheckout main");
    const deleteIndex = repo.calls.indexOf("deleteLocalBranch topic");
    expect(switchIndex).toBeGreaterThan(-1);
    expect(deleteIndex).toBeGreaterThan(switchIndex);
    expect(repo.checkedOut).toBe("main");
    expect(await repo.listLocalBranches()).toEqual(["main"]);
  });

  it("treats the default branch as checked out after switching to it", async () => {
    const topic = repo.commit("t1", [base], { "README.md": "# demo\n", "a.txt": "a\n" });
    goneBranch("a-topic", topic);
    repo.pushRemote("origin", "main", topic);
    repo.checkout("a-topic");

    await service.sync();

    // main is processed after the switch, so it is fast-forwarded through the working tree
    expect(repo.calls).toContain("fastForwardOnly refs/remotes/origin/main");
    expect(repo.branchCommit("main")).toBe(topic);
    expect(output.messages("info")).toEqual([
      "Deleted branch a-topic (was t100000).",
      "Updated branch main (was c000000).",
    ]);
  });

  it("honours a master default branch in warnings", async () => {
    const fresh = new FakeGitBackend();
    const root = fresh.commit("c0", [], { "README.md": "# demo\n" });
    const topic = fresh.commit("t1", [root], { "README.md": "# demo\n", "a.txt": "a\n" });
    fresh.addRemote("origin");
    fresh.seedRemote("origin", { master: root, topic });
    fresh.setLocalBranch("master", root, { remote: "origin" });
    fresh.setLocalBranch("topic", topic, { remote: "origin" });
    fresh.deleteRemoteBranch("origin", "topic");
    fresh.checkout("master");

    await new BranchSyncService(fresh, { logger: output.logger }).sync();

    expect(output.messages("warn")).toEqual([
      "warning: 'topic' was deleted on origin, but appears not merged into 'master'",
    ]);
  });
});
