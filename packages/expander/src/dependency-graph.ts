/**
 * Dependency graph over declaration keys.
 *
 * An edge `from -> to` means the expansion of `to` read data that an
 * expansion on `from` produces. Nodes and edges keep insertion order, so the
 * cycle reported for a given batch is always the same one.
 */

import type { DependencyEdge } from "@hitch/core";

export interface DependencyCycle {
  /** Declaration keys along the cycle, first key repeated at the end */
  readonly path: readonly string[];
  readonly edges: readonly DependencyEdge[];
}

type Colour = "white" | "grey" | "black";

export class DependencyGraph {
  private readonly adjacency = new Map<string, DependencyEdge[]>();
  private readonly edgeList: DependencyEdge[] = [];

  addNode(key: string): void {
    if (!this.adjacency.has(key)) this.adjacency.set(key, []);
  }

  /** Add an edge; a repeated (from, to) pair keeps its first reason */
  addEdge(from: string, to: string, reason: string): void {
    this.addNode(from);
    this.addNode(to);
    const out = this.adjacency.get(from) ?? [];
    if (out.some((edge) => edge.to === to)) return;
    const edge: DependencyEdge = { from, to, reason };
    out.push(edge);
    this.edgeList.push(edge);
  }

  edges(): readonly DependencyEdge[] {
    return this.edgeList;
  }

  get size(): number {
    return this.adjacency.size;
  }

  findCycle(): DependencyCycle | undefined {
    const colour = new Map<string, Colour>();
    const stack: DependencyEdge[] = [];
    const nodes: string[] = [];

    const visit = (key: string): DependencyCycle | undefined => {
      colour.set(key, "grey");
      nodes.push(key);

      for (const edge of this.adjacency.get(key) ?? []) {
        const state = colour.get(edge.to) ?? "white";
        if (state === "grey") {
          const start = nodes.indexOf(edge.to);
          return {
            path: [...nodes.slice(start), edge.to],
            edges: [...stack.slice(start), edge],
          };
        }
        if (state === "white") {
          stack.push(edge);
          const found = visit(edge.to);
          if (found) return found;
          stack.pop();
        }
      }

      nodes.pop();
      colour.set(key, "black");
      return undefined;
    };

    for (const key of this.adjacency.keys()) {
      if ((colour.get(key) ?? "white") !== "white") continue;
      const found = visit(key);
      if (found) return found;
    }
    return undefined;
  }
}
