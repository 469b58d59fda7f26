/**
 * Path from the root of a compile/validate call to the point of failure.
 *
 * Segments are pushed while an error travels back up the call stack, so they
 * are stored leaf-first and rendered in reverse.
 */

export type BreadcrumbSegment =
  | { readonly kind: 'name'; readonly name: string }
  | { readonly kind: 'index'; readonly index: number };

export function nameSegment(name: string): BreadcrumbSegment {
  return { kind: 'name', name };
}

export function indexSegment(index: number): BreadcrumbSegment {
  return { kind: 'index', index };
}

/** Accepts `'items'` or `3` in place of a built segment. */
export type SegmentLike = BreadcrumbSegment | string | number;

export function toSegment(segment: SegmentLike): BreadcrumbSegment {
  if (typeof segment === 'string') return nameSegment(segment);
  if (typeof segment === 'number') return indexSegment(segment);
  return segment;
}

export class Breadcrumb {
  readonly #segments: BreadcrumbSegment[];

  constructor(segments: Iterable<BreadcrumbSegment> = []) {
    this.#segments = [...segments];
  }

  /** Build from root-to-leaf order, e.g. `Breadcrumb.fromPath(['a', 0])`. */
  static fromPath(path: readonly SegmentLike[]): Breadcrumb {
    return new Breadcrumb(path.map(toSegment).reverse());
  }

  push(segment: SegmentLike): void {
    this.#segments.push(toSegment(segment));
  }

  get length(): number {
    return this.#segments.length;
  }

  /** Segments in root-to-leaf order. */
  get path(): BreadcrumbSegment[] {
    return [...this.#segments].reverse();
  }

  clone(): Breadcrumb {
    return new Breadcrumb(this.#segments);
  }

  toString(): string {
    let out = '';
    for (let i = this.#segments.length - 1; i >= 0; i--) {
      const segment = this.#segments[i];
      if (segment === undefined) continue;
      out +=
        segment.kind === 'name' ? `.${segment.name}` : `[${segment.index}]`;
    }
    return out;
  }
}
