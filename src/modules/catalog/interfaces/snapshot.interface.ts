/**
 * Immutable, pre-rendered text view of a piece of catalog state
 *
 * Writers build a new frozen value and swap it in; readers share the value
 * they were given without copying it.
 */
export interface Snapshot {
  /** Increases by one every time the owning cache is rebuilt */
  readonly version: number;

  /** Rendered listing, every line ending with the line terminator */
  readonly text: string;
}

export function createSnapshot(version: number, text: string): Snapshot {
  return Object.freeze({ version, text });
}
