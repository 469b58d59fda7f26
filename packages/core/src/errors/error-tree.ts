import { Breadcrumb, type SegmentLike } from './breadcrumb.js';

export interface ErrorLeaf {
  /** Rendered path, `#` followed by the breadcrumb (e.g. `#.items[2]`) */
  path: string;
  message: string;
}

/**
 * Common shape of the compile-time and validation-time error trees: a kind
 * plus the breadcrumb collected on the way up. `Multiple` nodes hold sibling
 * errors of the same tree type.
 */
export abstract class ErrorTree<K extends { readonly type: string }> {
  readonly state: Breadcrumb;

  constructor(
    readonly kind: K,
    state: Breadcrumb = new Breadcrumb()
  ) {
    this.state = state;
  }

  /** Sibling errors when this node aggregates, otherwise undefined */
  protected abstract get children(): readonly ErrorTree<K>[] | undefined;

  /** Human-readable message of a leaf node */
  abstract describe(): string;

  /** Push a field-name segment; used while the error crosses a field boundary. */
  withPathName(name: string): this {
    this.state.push(name);
    return this;
  }

  /** Push an index segment; used while the error crosses an element boundary. */
  withPathIndex(index: number): this {
    this.state.push(index);
    return this;
  }

  withPath(segment: SegmentLike): this {
    this.state.push(segment);
    return this;
  }

  /**
   * Depth-first walk: a Multiple node extends the prefix with its own
   * breadcrumb, a leaf yields `<prefix><breadcrumb>: <message>`.
   */
  leaves(root = '#'): ErrorLeaf[] {
    const out: ErrorLeaf[] = [];
    this.#collect(root, out);
    return out;
  }

  #collect(root: string, out: ErrorLeaf[]): void {
    const prefix = `${root}${this.state.toString()}`;
    const children = this.children;
    if (children) {
      for (const child of children) {
        child.#collect(prefix, out);
      }
      return;
    }
    out.push({ path: prefix, message: this.describe() });
  }

  /** Newline-terminated report, one line per leaf error. */
  toString(): string {
    return this.leaves()
      .map((leaf) => `${leaf.path}: ${leaf.message}\n`)
      .join('');
  }
}
