/**
 * Commit lookup for run manifests.
 */

import { simpleGit, SimpleGit } from "simple-git";
import type { CommitResolver } from "./types.js";

export const NO_COMMIT = "NA";

/**
 * Full hash of HEAD when `projectDir` is inside a git work tree, otherwise
 * `NA`. A missing git binary, a repository without commits or any other
 * git failure also yields `NA`.
 */
export const resolveCommitHash: CommitResolver = async (projectDir) => {
  let git: SimpleGit;
  try {
    git = simpleGit(projectDir);
  } catch (error) {
    // simple-git throws synchronously when the directory does not exist
    console.error(
      `[git] Cannot open ${projectDir}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return NO_COMMIT;
  }

  try {
    const insideWorkTree = await git.checkIsRepo();
    if (!insideWorkTree) {
      return NO_COMMIT;
    }
    const hash = (await git.revparse(["HEAD"])).trim();
    return /^[0-9a-f]{7,64}$/.test(hash) ? hash : NO_COMMIT;
  } catch (error) {
    console.error(
      `[git] Commit lookup failed in ${projectDir}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return NO_COMMIT;
  }
};
