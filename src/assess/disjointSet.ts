/** Union-find over the indices 0..size-1 with path compression and union by rank. */
export class DisjointSet {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_value, index) => index);
    this.rank = new Array<number>(size).fill(0);
  }

  get size(): number {
    return this.parent.length;
  }

  find(index: number): number {
    let root = index;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    let current = index;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }

  union(a: number, b: number): number {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return rootA;

    if (this.rank[rootA] < this.rank[rootB]) {
      this.parent[rootA] = rootB;
      return rootB;
    }
    if (this.rank[rootA] > this.rank[rootB]) {
      this.parent[rootB] = rootA;
      return rootA;
    }
    this.parent[rootB] = rootA;
    this.rank[rootA] += 1;
    return rootA;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }
}
