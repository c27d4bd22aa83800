/**
 * Discovery subsystem types.
 * Identity keys, traversal frames, options and observer events.
 *
 * @module src/discovery/types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Identity
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dedup/loop-detection token for a filesystem entry.
 * Device/inode when the platform reports usable values, else the real path.
 */
export type IdentityKey =
  | { kind: 'inode'; dev: bigint; ino: bigint }
  | { kind: 'path'; path: string };

// ─────────────────────────────────────────────────────────────────────────────
// Traversal
// ─────────────────────────────────────────────────────────────────────────────

/** Unit of pending work; depth 0 = a root directory's direct children */
export type TraversalFrame = {
  dir: string;
  depth: number;
};

/** Discovery decision, reported to an optional observer */
export type DiscoveryEvent =
  | { type: 'root-file'; path: string }
  | { type: 'root-missing'; path: string }
  | { type: 'skip-hidden-dir'; path: string }
  | { type: 'read-dir-failed'; path: string; message: string }
  | { type: 'skip-hidden'; path: string }
  | { type: 'skip-seen'; path: string; key: string }
  | { type: 'file'; path: string }
  | { type: 'dir'; path: string; depth: number }
  | { type: 'depth-limit'; path: string; depth: number };

export type DiscoveryObserver = (event: DiscoveryEvent) => void;

/** Discovery configuration */
export type DiscoveryOptions = {
  /** Yield and descend into dot-entries (default: false) */
  includeHidden?: boolean;
  /** Classify symlinks by their targets (default: false) */
  followSymlinks?: boolean;
  /** Deepest directory level to descend into (undefined = unlimited) */
  maxDepth?: number;
  /** Receives every discovery decision */
  onEvent?: DiscoveryObserver;
};
