import { CatalogErrors } from './catalog.errors';
import { FIELD_SEPARATOR, LINE_TERMINATOR } from './catalog.constants';
import {
  CatalogResult,
  Snapshot,
  createSnapshot,
  fail,
  ok,
} from './interfaces';

const LINE_BREAK = /[\r\n]/;

/**
 * IdentifierCatalog assigns unique numeric ids to unique text labels
 *
 * - Ids start at 1, increase strictly and are never reused until clear()
 * - Labels are unique and immutable once added
 * - The "id,label" listing is rendered on every change, so snapshot() is free
 *
 * Not synchronized: the owner serializes writers against readers.
 */
export class IdentifierCatalog {
  private nextId = 1;
  private readonly labelsById = new Map<number, string>();

  /** Labels currently present, for duplicate checks */
  private readonly labels = new Set<string>();

  private cached: Snapshot;

  /**
   * @param entity Name used in error codes and messages, e.g. "movie"
   */
  constructor(readonly entity: string) {
    this.cached = createSnapshot(0, '');
  }

  get size(): number {
    return this.labelsById.size;
  }

  /**
   * Add a batch of labels and assign each the next unused id
   *
   * The batch is all-or-nothing: if any label already exists or contains a
   * line break, nothing is added. Ids are assigned in the set's iteration
   * order.
   *
   * @returns The ids assigned to the batch
   */
  add(labels: ReadonlySet<string>): CatalogResult<number[]> {
    const batch = [...labels];

    const invalid = batch.filter((label) => LINE_BREAK.test(label));
    if (invalid.length > 0) {
      return fail(CatalogErrors.invalidLabel(this.entity, invalid));
    }

    const duplicates = batch.filter((label) => this.labels.has(label));
    if (duplicates.length > 0) {
      return fail(CatalogErrors.alreadyExists(this.entity, duplicates));
    }

    const assigned: number[] = [];
    for (const label of batch) {
      const id = this.nextId++;
      this.labelsById.set(id, label);
      this.labels.add(label);
      assigned.push(id);
    }

    this.rebuildSnapshot();
    return ok(assigned);
  }

  getLabel(id: number): CatalogResult<string> {
    const label = this.labelsById.get(id);
    if (label === undefined) {
      return fail(CatalogErrors.notFound(this.entity, id));
    }
    return ok(label);
  }

  has(id: number): boolean {
    return this.labelsById.has(id);
  }

  /**
   * All ids in ascending order
   * Not cached: cost grows with the catalog
   */
  sortedIds(): number[] {
    return [...this.labelsById.keys()].sort((a, b) => a - b);
  }

  /**
   * One "id,label" line per entry, in ascending id order
   */
  snapshot(): Snapshot {
    return this.cached;
  }

  /**
   * Remove every entry; the next add() starts again at id 1
   */
  clear(): void {
    this.labelsById.clear();
    this.labels.clear();
    this.nextId = 1;

    this.rebuildSnapshot();
  }

  private rebuildSnapshot(): void {
    let text = '';
    for (const [id, label] of this.labelsById) {
      text += `${id}${FIELD_SEPARATOR}${label}${LINE_TERMINATOR}`;
    }
    this.cached = createSnapshot(this.cached.version + 1, text);
  }
}
