import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GitLabClient, toDescriptor } from "../src/api/gitlab-client.js";
import { AppConfig, loadConfig } from "../src/config.js";
import { SlugCollisionError } from "../src/errors.js";
import { discoverRepos, filterRepos } from "../src/orchestration/discover.js";
import { logSummary, runMigration, RunDependencies } from "../src/orchestration/run-migration.js";
import { ProgressStore } from "../src/state/progress-store.js";
import { Logger } from "../src/util/logger.js";
import {
  FakeDestination,
  FakeSourceControl,
  fakeRepo,
  gitlabProject,
  jsonResponse,
} from "./helpers/fakes.js";

const MB = 1024 * 1024;

describe("filterRepos", () => {
  const repos = ["team/app", "team/lib", "team/docs"].map((path, index) =>
    toDescriptor(gitlabProject(index + 1, path))
  );

  it("keeps everything without filters", () => {
    expect(filterRepos(repos, [], [])).toHaveLength(3);
  });

  it("applies the include list, then the exclude list", () => {
    const filtered = filterRepos(repos, ["team/app", "team/lib"], ["team/lib"]);
    expect(filtered.map((repo) => repo.path)).toEqual(["team/app"]);
  });
});

describe("runMigration", () => {
  const fetchMock = vi.fn();
  let root: string;
  let config: AppConfig;
  let deps: RunDependencies;
  let git: FakeSourceControl;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);

    root = await mkdtemp(join(tmpdir(), "run-"));
    config = loadConfig(
      {
        GITLAB_BASE_URL: "https://gitlab.test",
        GITLAB_TOKEN: "test-gitlab-token",
        GITHUB_TOKEN: "test-github-token",
        GITHUB_ORG: "acme",
        MIRROR_ROOT: root,
        MIGRATE_CONCURRENCY: "2",
        RETRY_ATTEMPTS: "1",
      },
      root
    );

    git = new FakeSourceControl();
    git.repos.set("https://gitlab.test/team/app.git", fakeRepo({ "refs/heads/main": "a1" }));
    git.repos.set(
      "https://gitlab.test/team/assets.git",
      fakeRepo({ "refs/heads/main": "b1" }, [{ id: "video", type: "blob", size: 150 * MB }])
    );

    const logger = new Logger();
    deps = {
      gitlab: new GitLabClient({
        baseUrl: config.gitlab.baseUrl,
        token: config.gitlab.token,
        retry: { attempts: 1 },
      }),
      destination: new FakeDestination(),
      git,
      progress: new ProgressStore(config.paths.stateDir),
      logger,
    };
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("migrates a group and reports per-repository failures", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse([
        gitlabProject(1, "team/app"),
        gitlabProject(2, "team/assets"),
        gitlabProject(3, "team/missing"),
      ])
    );

    const summary = await runMigration(config, { groupId: "team" }, deps);

    expect(summary.results.map((r) => [r.path, r.outcome])).toEqual([
      ["team/app", "migrated"],
      ["team/assets", "migrated"],
      ["team/missing", "failed"],
    ]);
    expect([summary.migrated, summary.skipped, summary.dryRun, summary.failed]).toEqual([
      2, 0, 0, 1,
    ]);
    expect(summary.results[2].errorType).toBe("permanent");
    expect(git.repos.get("https://github.test/acme/team-assets.git")?.refs.get("refs/heads/main")).toBe(
      "b1-lfs"
    );
  });

  it("migrates only the requested repository", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(gitlabProject(1, "team/app")));

    const summary = await runMigration(
      config,
      { groupId: "team", singleRepoUrl: "https://gitlab.test/team/app.git" },
      deps
    );

    expect(summary.results.map((r) => r.slug)).toEqual(["team-app"]);
    expect(fetchMock.mock.calls[0][0]).toBe("https://gitlab.test/api/v4/projects/team%2Fapp");
  });

  it("refuses to start when two paths share a slug", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse([gitlabProject(1, "team/a-b"), gitlabProject(2, "team-a/b")])
    );

    const discovery = discoverRepos(
      deps.gitlab,
      { groupId: "team", includeArchived: true, includeRepos: [], excludeRepos: [] },
      deps.logger
    );

    await expect(discovery).rejects.toThrow(SlugCollisionError);
  });

  it("summarizes the run", () => {
    const logger = new Logger();
    const info = vi.spyOn(logger, "info").mockImplementation(() => {});
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});

    logSummary(
      {
        results: [
          { slug: "team-app", path: "team/app", outcome: "migrated", warnings: [] },
          {
            slug: "team-lib",
            path: "team/lib",
            outcome: "failed",
            warnings: [],
            error: "Authentication failed",
            errorType: "permanent",
          },
        ],
        migrated: 1,
        skipped: 0,
        dryRun: 0,
        failed: 1,
      },
      logger
    );

    expect(info.mock.calls.map(([line]) => line)).toEqual([
      "=".repeat(60),
      "Migration Summary",
      "=".repeat(60),
      "Total processed: 2",
      "Migrated: 1",
      "Skipped (destination non-empty): 0",
      "Failed: 1",
    ]);
    expect(warn.mock.calls.map(([line]) => line)).toEqual([
      "Failed repos:",
      "  - team/lib [permanent]: Authentication failed",
    ]);
  });
});
