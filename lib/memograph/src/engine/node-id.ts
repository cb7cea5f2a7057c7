/**
 * Opaque handle to a node inside one arena.
 *
 * Ids are minted only by the arena that owns the node; `arenaId` lets the
 * arena reject handles that come from another graph.
 */
export class NodeId {
  /**
   * @internal use `NodeArena.add` to obtain ids
   */
  constructor(
    public readonly arenaId: number,
    public readonly index: number
  ) {
    Object.freeze(this);
  }

  equals(other: NodeId): boolean {
    return this.arenaId === other.arenaId && this.index === other.index;
  }

  toString(): string {
    return `#${this.index}`;
  }
}
