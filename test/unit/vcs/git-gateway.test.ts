import { after, before, describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GitGateway, GIT_ENV } from "../../../src/vcs/index.js";
import {
  createMockExecutor,
  createMockLogger,
  type ExecutorMockConfig,
  type MockResponse,
} from "../../mocks/index.js";

const REPO = "/src/api";

function setup(config: ExecutorMockConfig = {}, retries = 0) {
  const executor = createMockExecutor(config);
  const logger = createMockLogger();
  const gateway = new GitGateway(logger.mock, executor.mock, {
    timeoutMs: 5_000,
    retries,
    retryMinTimeout: 1,
    now: () => new Date("2026-01-02T03:04:05.000Z"),
  });
  return { gateway, executor, logger };
}

describe("GitGateway", () => {
  describe("isRepository", () => {
    let root: string;

    before(() => {
      root = mkdtempSync(join(tmpdir(), "update-repos-gateway-"));
      mkdirSync(join(root, "checkout", ".git"), { recursive: true });
      mkdirSync(join(root, "worktree"));
      writeFileSync(join(root, "worktree", ".git"), "gitdir: /elsewhere\n");
      mkdirSync(join(root, "plain"));
    });

    after(() => {
      rmSync(root, { recursive: true, force: true });
    });

    test("recognizes .git directories and .git files", () => {
      const { gateway } = setup();
      assert.equal(gateway.isRepository(join(root, "checkout")), true);
      assert.equal(gateway.isRepository(join(root, "worktree")), true);
      assert.equal(gateway.isRepository(join(root, "plain")), false);
    });
  });

  describe("getStatus", () => {
    test("reports the branch and a dirty tree", async () => {
      const { gateway, executor } = setup({
        responses: new Map<string, MockResponse>([
          ["symbolic-ref", "main"],
          ["status --porcelain", " M a.txt\n?? b.txt"],
        ]),
      });

      assert.deepEqual(await gateway.getStatus(REPO), {
        branch: "main",
        detached: false,
        dirty: true,
      });
      assert.deepEqual(executor.commands(), [
        "git symbolic-ref --short -q HEAD",
        "git status --porcelain",
      ]);
      assert.deepEqual(executor.calls[0].options, {
        env: { ...GIT_ENV },
        timeoutMs: 5_000,
      });
      assert.equal(executor.calls[0].cwd, REPO);
    });

    test("labels a detached HEAD with its short revision", async () => {
      const { gateway } = setup({
        responses: new Map<string, MockResponse>([
          ["symbolic-ref", { exitCode: 1 }],
          ["rev-parse --short HEAD", "abc1234"],
          ["status --porcelain", ""],
        ]),
      });

      assert.deepEqual(await gateway.getStatus(REPO), {
        branch: "(detached at abc1234)",
        detached: true,
        dirty: false,
      });
    });

    test("falls back to a bare detached label when HEAD cannot be resolved", async () => {
      const { gateway, logger } = setup({
        responses: new Map<string, MockResponse>([
          ["symbolic-ref", { exitCode: 1 }],
          ["rev-parse --short HEAD", { exitCode: 128, stderr: "fatal: ambiguous argument 'HEAD'" }],
          ["status --porcelain", ""],
        ]),
      });

      const status = await gateway.getStatus(REPO);
      assert.equal(status.branch, "(detached)");
      assert.equal(status.detached, true);
      assert.deepEqual(logger.warnings, [
        `api: resolving HEAD failed (fatal: ambiguous argument 'HEAD'); assuming {"branch":"(detached)","detached":true}`,
      ]);
    });

    test("reports an unknown dirty state when git status fails", async () => {
      const { gateway, logger } = setup({
        responses: new Map<string, MockResponse>([
          ["symbolic-ref", "main"],
          ["status --porcelain", { exitCode: 128, stderr: "fatal: not a git repository" }],
        ]),
      });

      assert.equal((await gateway.getStatus(REPO)).dirty, null);
      assert.deepEqual(logger.warnings, [
        "api: git status failed (fatal: not a git repository); dirty state unknown",
      ]);
    });

    test("treats listed entries as dirty even when git status was cut short", async () => {
      const { gateway, logger } = setup({
        responses: new Map<string, MockResponse>([
          ["symbolic-ref", "main"],
          [
            "status --porcelain",
            { exitCode: null, stdout: "?? file-00001.txt\n?? file-00002.txt", stderr: "spawnSync /bin/sh ENOBUFS" },
          ],
        ]),
      });

      assert.equal((await gateway.getStatus(REPO)).dirty, true);
      assert.deepEqual(logger.warnings, []);
    });
  });

  describe("hasRemote", () => {
    test("matches remote names exactly", async () => {
      const { gateway } = setup({ defaultResponse: "origin\nupstream" });
      assert.equal(await gateway.hasRemote(REPO, "upstream"), true);
      assert.equal(await gateway.hasRemote(REPO, "up"), false);
    });

    test("assumes no remote when git remote fails", async () => {
      const { gateway } = setup({ defaultResponse: { exitCode: 128, stderr: "fatal: bad config" } });
      assert.equal(await gateway.hasRemote(REPO, "origin"), false);
    });
  });

  describe("fetch", () => {
    test("fetches and prunes the upstream remote", async () => {
      const { gateway, executor } = setup();
      assert.deepEqual(await gateway.fetch(REPO, { allRemotes: false, remote: "origin" }), {
        ok: true,
        note: "",
      });
      assert.deepEqual(executor.commands(), ["git fetch --prune 'origin'"]);
    });

    test("fetches every remote when asked", async () => {
      const { gateway, executor } = setup();
      await gateway.fetch(REPO, { allRemotes: true, remote: "origin" });
      assert.deepEqual(executor.commands(), ["git fetch --all --prune"]);
    });

    test("does not retry a failure that is not transient", async () => {
      const { gateway, executor, logger } = setup(
        { defaultResponse: { stderr: "error: cannot lock ref 'refs/remotes/origin/main'" } },
        3
      );

      assert.deepEqual(await gateway.fetch(REPO, { allRemotes: false, remote: "origin" }), {
        ok: false,
        note: "error: cannot lock ref 'refs/remotes/origin/main'",
      });
      assert.equal(executor.calls.length, 1);
      assert.deepEqual(logger.warnings, [
        "api: fetch failed: error: cannot lock ref 'refs/remotes/origin/main'",
      ]);
    });

    test("retries transient network failures", async () => {
      const { gateway, executor } = setup(
        {
          sequences: new Map<string, MockResponse[]>([
            [
              "fetch",
              [
                { exitCode: 128, stderr: "fatal: unable to access 'https://git.example.com/api.git/': Could not resolve host: git.example.com" },
                "",
              ],
            ],
          ]),
        },
        2
      );

      const result = await gateway.fetch(REPO, { allRemotes: false, remote: "origin" });
      assert.equal(result.ok, true);
      assert.equal(executor.calls.length, 2);
    });

    test("gives up once retries are exhausted", async () => {
      const { gateway, executor } = setup({ defaultResponse: { exitCode: null, timedOut: true } }, 1);

      assert.deepEqual(await gateway.fetch(REPO, { allRemotes: false, remote: "origin" }), {
        ok: false,
        note: "git fetch timed out",
      });
      assert.equal(executor.calls.length, 2);
    });
  });

  describe("aheadBehind", () => {
    test("is 0/0 for a detached HEAD without running git", async () => {
      const { gateway, executor } = setup();
      assert.deepEqual(await gateway.aheadBehind(REPO, "(detached at abc1234)", "origin"), {
        ahead: 0,
        behind: 0,
        remoteBranchExists: false,
      });
      assert.equal(executor.calls.length, 0);
    });

    test("is 0/0 when the remote branch does not exist", async () => {
      const { gateway, executor } = setup({
        responses: new Map<string, MockResponse>([["rev-parse --verify", { exitCode: 1 }]]),
      });
      assert.deepEqual(await gateway.aheadBehind(REPO, "feature", "origin"), {
        ahead: 0,
        behind: 0,
        remoteBranchExists: false,
      });
      assert.deepEqual(executor.commands(), [
        "git rev-parse --verify --quiet 'refs/remotes/origin/feature'",
      ]);
    });

    test("counts commits on each side", async () => {
      const { gateway, executor } = setup({
        responses: new Map<string, MockResponse>([
          ["rev-parse --verify", "5d6e7f8"],
          ["rev-list", "2\t5"],
        ]),
      });
      assert.deepEqual(await gateway.aheadBehind(REPO, "main", "origin"), {
        ahead: 2,
        behind: 5,
        remoteBranchExists: true,
      });
      assert.equal(
        executor.commands()[1],
        "git rev-list --left-right --count 'refs/heads/main...refs/remotes/origin/main'"
      );
    });

    test("reports an error instead of a missing branch on unparseable output", async () => {
      const { gateway, logger } = setup({
        responses: new Map<string, MockResponse>([
          ["rev-parse --verify", "5d6e7f8"],
          ["rev-list", "nonsense"],
        ]),
      });
      assert.deepEqual(await gateway.aheadBehind(REPO, "main", "origin"), {
        ahead: 0,
        behind: 0,
        remoteBranchExists: false,
        error: "unexpected rev-list output 'nonsense'",
      });
      assert.deepEqual(logger.warnings, [
        "api: counting ahead/behind failed (unexpected rev-list output 'nonsense'); counts unknown",
      ]);
    });
  });

  describe("pull", () => {
    test("refuses a detached HEAD", async () => {
      const { gateway, executor } = setup();
      assert.deepEqual(await gateway.pull(REPO, "(detached)", { rebase: false, remote: "origin" }), {
        ok: false,
        reason: "error",
        note: "HEAD is detached",
      });
      assert.equal(executor.calls.length, 0);
    });

    test("reports a remote branch that has disappeared", async () => {
      const { gateway, executor } = setup({
        responses: new Map<string, MockResponse>([["rev-parse --verify", { exitCode: 1 }]]),
      });
      assert.deepEqual(await gateway.pull(REPO, "feature", { rebase: false, remote: "origin" }), {
        ok: false,
        reason: "no-remote-branch",
        note: "No remote branch origin/feature",
      });
      assert.equal(executor.calls.length, 1);
    });

    test("fast-forwards by default", async () => {
      const { gateway, executor } = setup({
        responses: new Map<string, MockResponse>([
          ["rev-parse --verify", "5d6e7f8"],
          ["git pull", "Updating 1a2b3c4..5d6e7f8\nFast-forward"],
        ]),
      });
      assert.deepEqual(await gateway.pull(REPO, "main", { rebase: false, remote: "origin" }), {
        ok: true,
        note: "Updating 1a2b3c4..5d6e7f8",
      });
      assert.equal(executor.commands()[1], "git pull --ff-only 'origin' 'main'");
    });

    test("rebases when asked", async () => {
      const { gateway, executor } = setup({
        responses: new Map<string, MockResponse>([["rev-parse --verify", "5d6e7f8"]]),
      });
      await gateway.pull(REPO, "main", { rebase: true, remote: "upstream" });
      assert.equal(executor.commands()[1], "git pull --rebase 'upstream' 'main'");
    });
  });

  describe("stashPush", () => {
    test("stashes with a timestamped message and reports the ref", async () => {
      const { gateway, executor } = setup({
        responses: new Map<string, MockResponse>([
          ["stash push", "Saved working directory and index state On main: update-repos 2026-01-02T03:04:05.000Z"],
          ["stash list", "stash@{0}"],
        ]),
      });
      assert.deepEqual(await gateway.stashPush(REPO), {
        kind: "stashed",
        record: { ref: "stash@{0}", message: "update-repos 2026-01-02T03:04:05.000Z" },
      });
      assert.equal(
        executor.commands()[0],
        "git stash push --include-untracked -m 'update-repos 2026-01-02T03:04:05.000Z'"
      );
    });

    test("reports an empty push when there is nothing to stash", async () => {
      const { gateway, executor } = setup({
        responses: new Map<string, MockResponse>([["stash push", "No local changes to save"]]),
      });
      assert.deepEqual(await gateway.stashPush(REPO), { kind: "empty" });
      assert.equal(executor.calls.length, 1);
    });

    test("reports a failed push apart from an empty one", async () => {
      const { gateway, logger } = setup({
        responses: new Map<string, MockResponse>([["stash push", { exitCode: 1, stderr: "error: could not write index" }]]),
      });
      assert.deepEqual(await gateway.stashPush(REPO), {
        kind: "failed",
        note: "error: could not write index",
      });
      assert.deepEqual(logger.warnings, [
        "api: git stash push failed (error: could not write index); local changes left in place",
      ]);
    });
  });

  describe("stashPop", () => {
    test("reports a clean restore", async () => {
      const { gateway, executor } = setup({ defaultResponse: "Dropped refs/stash@{0} (1a2b3c4)" });
      assert.deepEqual(await gateway.stashPop(REPO), { kind: "restored" });
      assert.deepEqual(executor.commands(), ["git stash pop"]);
    });

    test("reports conflicts", async () => {
      const { gateway, logger } = setup({
        defaultResponse: { exitCode: 1, stdout: "CONFLICT (content): Merge conflict in a.txt" },
      });
      assert.deepEqual(await gateway.stashPop(REPO), { kind: "conflicts" });
      assert.deepEqual(logger.warnings, ["api: stash pop reported conflicts"]);
    });

    test("reports a pop that failed for another reason as failed", async () => {
      const { gateway, logger } = setup({
        defaultResponse: { exitCode: 1, stderr: "error: could not restore untracked files from stash" },
      });
      assert.deepEqual(await gateway.stashPop(REPO), {
        kind: "failed",
        note: "error: could not restore untracked files from stash",
      });
      assert.deepEqual(logger.warnings, [
        "api: git stash pop failed (error: could not restore untracked files from stash); stash kept",
      ]);
    });
  });
});
