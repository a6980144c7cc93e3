// Chrome discovery: puppeteer-core ships no browser, so use the one installed on the machine

import { existsSync } from "node:fs";
import { platform } from "node:os";
import { join } from "node:path";


/** Candidate Chrome paths for the current platform, env overrides first */
export function chromeCandidates(env: NodeJS.ProcessEnv = process.env, platformName: NodeJS.Platform = platform()): string[] {
  const paths: string[] = [];
  const envChrome = env.CHROME_PATH || env.CHROMIUM_PATH;
  if (envChrome) paths.push(envChrome);
  if (platformName === "darwin") {
    paths.push(
      "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
      "/Applications/Chromium.app/Contents/MacOS/Chromium",
      "/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge"
    );
  } else if (platformName === "linux") {
    paths.push(
      "/usr/bin/google-chrome",
      "/usr/bin/google-chrome-stable",
      "/usr/bin/chromium",
      "/usr/bin/chromium-browser",
      "/snap/bin/chromium"
    );
  } else if (platformName === "win32") {
    const programFiles = env["ProgramFiles"] || "C:\\Program Files";
    const programFilesX86 = env["ProgramFiles(x86)"] || "C:\\Program Files (x86)";
    paths.push(
      join(programFiles, "Google", "Chrome", "Application", "chrome.exe"),
      join(programFilesX86, "Google", "Chrome", "Application", "chrome.exe"),
      join(programFiles, "Microsoft", "Edge", "Application", "msedge.exe"),
      join(programFilesX86, "Microsoft", "Edge", "Application", "msedge.exe")
    );
  }
  return paths;
}


/** First candidate that exists, or null */
export function findChromeExecutable(env: NodeJS.ProcessEnv = process.env): string | null {
  for (const p of chromeCandidates(env)) {
    if (existsSync(p)) return p;
  }
  return null;
}
