import { beforeEach, describe, expect, test, vi } from "vitest";
import { spawnSync } from "child_process";
import {
  deployToCloudflarePages,
  wranglerPagesDeployArgs,
} from "./cloudflare-pages.js";

vi.mock("child_process", () => ({ spawnSync: vi.fn() }));

const options = {
  distDir: "public",
  projectName: "my-site",
  branch: "preview",
  commitDirty: false,
};

describe("wranglerPagesDeployArgs", () => {
  test("builds the pages deploy command line", () => {
    expect(wranglerPagesDeployArgs(options)).toEqual([
      "wrangler",
      "pages",
      "deploy",
      "public",
      "--project-name",
      "my-site",
      "--branch",
      "preview",
      "--commit-dirty=false",
    ]);
  });

  test("allows dirty commits when asked", () => {
    expect(
      wranglerPagesDeployArgs({ ...options, commitDirty: true }).at(-1),
    ).toBe("--commit-dirty=true");
  });
});

describe("deployToCloudflarePages", () => {
  beforeEach(() => {
    vi.mocked(spawnSync).mockReset();
  });

  const spawnResult = {
    pid: 100,
    output: [],
    stdout: "",
    stderr: "",
    signal: null,
  };

  test("runs wrangler through npx with inherited stdio", () => {
    vi.mocked(spawnSync).mockReturnValue({ ...spawnResult, status: 0 });

    const result = deployToCloudflarePages(options);

    expect(result).toEqual({ success: true, exitCode: 0 });
    expect(spawnSync).toHaveBeenCalledWith(
      "npx",
      wranglerPagesDeployArgs(options),
      { stdio: "inherit", shell: process.platform === "win32" },
    );
  });

  test("reports a non-zero exit as a failure", () => {
    vi.mocked(spawnSync).mockReturnValue({ ...spawnResult, status: 2 });

    expect(deployToCloudflarePages(options)).toEqual({
      success: false,
      exitCode: 2,
    });
  });

  test("reports spawn errors", () => {
    vi.mocked(spawnSync).mockReturnValue({
      ...spawnResult,
      status: null,
      error: new Error("spawn npx ENOENT"),
    });

    expect(deployToCloudflarePages(options)).toEqual({
      success: false,
      exitCode: 1,
      error: "spawn npx ENOENT",
    });
  });

  test("treats a signal-killed wrangler as exit code 1", () => {
    vi.mocked(spawnSync).mockReturnValue({
      ...spawnResult,
      status: null,
      signal: "SIGTERM",
    });

    expect(deployToCloudflarePages(options)).toEqual({
      success: false,
      exitCode: 1,
    });
  });
});
