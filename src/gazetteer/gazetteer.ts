/**
 * Gazetteer: one flattened, case-normalized set of place names.
 *
 * Cities, regions and countries all land in the same set and the column a
 * name came from is not kept, so "georgia" the country and "georgia" the
 * state are one entry. Location matching inherits that imprecision.
 */

export type ReferenceRow = Readonly<Record<string, unknown>>;

export function normalizePlaceName(value: string): string {
  return value.trim().toLowerCase();
}

export class Gazetteer {
  private readonly names: ReadonlySet<string>;

  private constructor(names: Set<string>) {
    this.names = names;
  }

  static build(referenceRows: Iterable<ReferenceRow>, columns: readonly string[]): Gazetteer {
    const names = new Set<string>();

    for (const row of referenceRows) {
      for (const column of columns) {
        const value = row[column];
        // Missing values skip this column only
        if (typeof value !== 'string') continue;
        const normalized = normalizePlaceName(value);
        if (normalized) {
          names.add(normalized);
        }
      }
    }

    return new Gazetteer(names);
  }

  static empty(): Gazetteer {
    return new Gazetteer(new Set());
  }

  contains(candidate: string): boolean {
    return this.names.has(normalizePlaceName(candidate));
  }

  get size(): number {
    return this.names.size;
  }

  entries(): string[] {
    return [...this.names];
  }
}
