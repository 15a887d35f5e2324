/**
 * Identifier scopes and blank identifier synthesis.
 *
 * Each graph (the document root or a bundle) is its own identifier
 * scope: an `@id` appears at most once among the node and link
 * objects of that graph.
 */

import { v5 as uuidv5 } from 'uuid';

/** UUID v5 namespace for synthesized relation identifiers */
export const BLANK_ID_NAMESPACE = '6f1c8e2a-4b7d-5c3e-9a0f-d2b4e6a81c57';

/**
 * Deterministic blank identifier for the `ordinal`-th synthesized record
 * of `kind` inside the bundle path `scope` (empty for the root).
 *
 * @example
 * ```ts
 * synthesizeBlankId([], 'wasGeneratedBy', 1);
 * // '_:' + uuidv5('wasGeneratedBy|1', BLANK_ID_NAMESPACE)
 * ```
 */
export function synthesizeBlankId(
  scope: readonly string[],
  kind: string,
  ordinal: number
): string {
  const name = [...scope, kind, String(ordinal)].join('|');
  return `_:${uuidv5(name, BLANK_ID_NAMESPACE)}`;
}

export class IdentifierScope {
  private readonly used = new Set<string>();
  private readonly ordinals = new Map<string, number>();

  constructor(private readonly scope: readonly string[]) {}

  has(id: string): boolean {
    return this.used.has(id);
  }

  claim(id: string): void {
    this.used.add(id);
  }

  /** Claim a fresh blank identifier for a record of `kind` */
  synthesize(kind: string): string {
    let ordinal = this.ordinals.get(kind) ?? 0;
    let id: string;
    do {
      ordinal += 1;
      id = synthesizeBlankId(this.scope, kind, ordinal);
    } while (this.used.has(id));

    this.ordinals.set(kind, ordinal);
    this.used.add(id);
    return id;
  }
}
