/**
 * Deploy a static directory to Cloudflare Pages via Direct Upload.
 *
 * Shells out to the wrangler CLI, which owns authentication and the upload
 * itself. Its output goes straight to the terminal.
 */

import { spawnSync } from "child_process";

export interface CloudflarePagesOptions {
  distDir: string;
  projectName: string;
  branch: string;
  commitDirty: boolean;
}

export interface PagesDeployResult {
  success: boolean;
  exitCode: number;
  error?: string;
}

/**
 * Arguments for `npx`, starting with the wrangler package name.
 */
export function wranglerPagesDeployArgs(
  options: CloudflarePagesOptions,
): string[] {
  return [
    "wrangler",
    "pages",
    "deploy",
    options.distDir,
    "--project-name",
    options.projectName,
    "--branch",
    options.branch,
    `--commit-dirty=${options.commitDirty}`,
  ];
}

/**
 * Deploy to Cloudflare Pages using wrangler CLI. Blocks until wrangler exits.
 */
export function deployToCloudflarePages(
  options: CloudflarePagesOptions,
): PagesDeployResult {
  const result = spawnSync("npx", wranglerPagesDeployArgs(options), {
    stdio: "inherit",
    // npx is a .cmd shim on Windows
    shell: process.platform === "win32",
  });

  if (result.error) {
    return { success: false, exitCode: 1, error: result.error.message };
  }

  // status is null when wrangler was killed by a signal
  const exitCode = result.status ?? 1;
  return { success: exitCode === 0, exitCode };
}
