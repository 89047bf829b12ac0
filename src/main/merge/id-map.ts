import type { EntityKindName } from '../../shared/merge-types';

/**
 * Per-run old-id -> new-id translation, one map per entity kind.
 *
 * Each source identifier is recorded once per run because every source row is
 * read exactly once. Lookups for a kind are only valid after that kind has
 * been merged; the merge schedule guarantees this, so it is not checked here.
 */
export class IdTranslationTable {
  private readonly maps = new Map<EntityKindName, Map<number, number>>();

  forKind(kind: EntityKindName): Map<number, number> {
    let map = this.maps.get(kind);
    if (!map) {
      map = new Map<number, number>();
      this.maps.set(kind, map);
    }
    return map;
  }
}
