/**
 * Deploy the VoDy font site (www/) to Cloudflare Pages.
 *
 * Usage:
 *   npx vodyfont-deploy [--no-pause]
 *
 * This command:
 * 1. Prints what is about to be deployed
 * 2. Runs `wrangler pages deploy` for the vodyfont project
 * 3. Prints the site URLs and waits for a keypress
 *
 * The footer is printed whatever wrangler's exit code; check wrangler's own
 * output (or this command's exit code) to see whether the upload went through.
 */

import { deployToCloudflarePages } from "./cloudflare-pages.js";
import { waitForKeypress } from "./prompt.js";

export const SITE = {
  distDir: "www",
  projectName: "vodyfont",
  branch: "main",
  commitDirty: true,
  urls: ["https://vodyfont.pages.dev", "https://main.vodyfont.pages.dev"],
} as const;

export interface ParsedArgs {
  help: boolean;
  pause: boolean;
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    help: false,
    pause: true,
  };

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--no-pause") {
      result.pause = false;
    }
  }

  return result;
}

export function showHelp(): void {
  console.log(`
Usage: npx vodyfont-deploy [options]

Deploy ./${SITE.distDir} to the Cloudflare Pages project "${SITE.projectName}" (branch ${SITE.branch}).
Requires 'npx wrangler login' or CLOUDFLARE_API_TOKEN.

Options:
      --no-pause    Exit without waiting for a keypress
  -h, --help        Show this help message
`);
}

/**
 * Run the deployment and return wrangler's exit code.
 */
export async function runDeploy(
  args: ParsedArgs = { help: false, pause: true },
): Promise<number> {
  console.log("🚀 VoDy Font Deploy");
  console.log("");
  console.log(
    `Deploying ${SITE.distDir}/ to Cloudflare Pages project "${SITE.projectName}"...`,
  );
  console.log("");

  const result = deployToCloudflarePages({
    distDir: SITE.distDir,
    projectName: SITE.projectName,
    branch: SITE.branch,
    commitDirty: SITE.commitDirty,
  });

  if (result.error) {
    console.error(`❌ Could not run wrangler: ${result.error}`);
  }

  console.log("");
  console.log("✨ Done! Site is live at:");
  for (const url of SITE.urls) {
    console.log(`   ${url}`);
  }

  if (args.pause) {
    await waitForKeypress("Press any key to exit...");
  }

  return result.exitCode;
}

/**
 * Entry point for the `vodyfont-deploy` bin. Resolves with the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    showHelp();
    return 0;
  }

  return runDeploy(args);
}
