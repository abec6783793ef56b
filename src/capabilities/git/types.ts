/**
 * Git capability types
 */

export interface GitInfo {
  /** Branch name HEAD points at */
  branch: string;
  /** Commit hash of the branch, null when the ref is not a loose file */
  hash: string | null;
}
