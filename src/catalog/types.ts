/** One schedulable unit, resolved against the base directory. */
export type TaskDescriptor = {
  /** The catalog entry as written, e.g. `binance.py`. */
  readonly entry: string;
  /** Display name: the entry's base name without its extension. */
  readonly name: string;
  /** Absolute path of the backing file. */
  readonly path: string;
};

export type ResolvedCatalog = {
  tasks: TaskDescriptor[];
  /** Entries dropped because nothing exists at their path. */
  missing: string[];
};
