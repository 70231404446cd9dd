/**
 * Snapshot Collaborator Contract
 *
 * Taken before any caution or dangerous mutation. How the snapshot is stored
 * (git stash, copy-on-write, ...) is the collaborator's business.
 */

export interface SnapshotCollaborator {
  /** Resolves with an opaque snapshot id; rejects when the snapshot could not be taken. */
  snapshot(reason: string): Promise<string>;
}
