import { simpleGit, type SimpleGit } from "simple-git";

/** Source revision facts a release records. */
export interface RevisionSource {
  getCurrentSha(ref?: string): Promise<string>;
  /** Commit time in seconds since the epoch. */
  getCommitTime(ref?: string): Promise<number>;
  getTagsAtHead(): Promise<string[]>;
  isClean(): Promise<boolean>;
}

/**
 * Git operations wrapper: abstracts simple-git for testability.
 */
export class GitOperations implements RevisionSource {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Get SHA of a ref (defaults to HEAD). */
  async getCurrentSha(ref = "HEAD"): Promise<string> {
    const result = await this.git.revparse([ref]);
    return result.trim();
  }

  async getCommitTime(ref = "HEAD"): Promise<number> {
    const out = await this.git.raw(["log", "-1", "--format=%ct", ref]);
    const seconds = parseInt(out.trim(), 10);
    if (isNaN(seconds)) throw new Error(`Unexpected commit time for ${ref}: ${out.trim()}`);
    return seconds;
  }

  /** Tags pointing at HEAD. */
  async getTagsAtHead(): Promise<string[]> {
    const out = await this.git.raw(["tag", "--points-at", "HEAD"]);
    return out
      .trim()
      .split("\n")
      .filter((t) => t.length > 0);
  }

  async isClean(): Promise<boolean> {
    const status = await this.git.status();
    return status.isClean();
  }
}
