/**
 * Priority Resolver
 * Picks the single label that decides a message's folder.
 */

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export class PriorityResolver {
  private readonly ranks: Map<string, number>;

  constructor(order: readonly string[]) {
    this.ranks = new Map();
    order.forEach((label, index) => {
      if (!this.ranks.has(label)) {
        this.ranks.set(label, index);
      }
    });
  }

  /**
   * The listed label with the lowest index wins. Unlisted labels all share the
   * lowest priority and are ordered by UTF-16 code units. Returns null for an
   * empty label set.
   */
  resolve(labels: Iterable<string>): string | null {
    let winner: string | null = null;
    let winnerRank = Infinity;

    for (const label of labels) {
      const rank = this.ranks.get(label) ?? Infinity;
      if (
        winner === null ||
        rank < winnerRank ||
        (rank === winnerRank && compareCodeUnits(label, winner) < 0)
      ) {
        winner = label;
        winnerRank = rank;
      }
    }

    return winner;
  }

  get order(): string[] {
    return [...this.ranks.entries()]
      .sort(([, a], [, b]) => a - b)
      .map(([label]) => label);
  }
}
