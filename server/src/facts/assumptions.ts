/**
 * Assumption Graph
 *
 * Holds assumptions keyed by id with automatically maintained inverse
 * edges. Status changes cascade: invalidation walks dependents
 * breadth-first (bounded depth, visited set) and flags every active node
 * it reaches as at_risk; confirmation upgrades guessed direct dependents
 * to informed.
 */

import { FactNotFoundError } from "../errors.js";
import type {
  Assumption,
  AssumptionQuery,
  AssumptionStatus,
  CascadeEffect,
  CascadeReport,
  Confidence,
  RegisterAssumptionInput,
  RegisterResult,
} from "./types.js";

export const DEFAULT_CASCADE_DEPTH = 8;

function normalizeClaim(claim: string): string {
  return claim.trim().replace(/\s+/g, " ").toLowerCase();
}

function idNumber(id: string): number {
  return Number.parseInt(id.slice(1), 10) || 0;
}

function clone(a: Assumption): Assumption {
  return {
    ...a,
    dependsOn: [...a.dependsOn],
    dependents: [...a.dependents],
    impliedStakeholders: [...a.impliedStakeholders],
  };
}

export function cascadeNote(origin: string, reason: string, path: string[]): string {
  // path runs origin → ... → target; intermediates are the hops between them
  const via = path.slice(1, -1);
  const suffix = via.length ? ` (via ${via.join(" → ")})` : "";
  return `⚠️ Dependency ${origin} was invalidated: ${reason}${suffix}`;
}

export function confidenceNote(previous: Confidence, next: Confidence, reason: string): string {
  return `Confidence ${previous} → ${next}: ${reason}`;
}

function appendNote(node: Assumption, note: string): void {
  node.basis = node.basis ? `${node.basis}\n${note}` : note;
}

export class AssumptionGraph {
  private readonly nodes = new Map<string, Assumption>();
  private counter = 0;

  constructor(private readonly cascadeDepth = DEFAULT_CASCADE_DEPTH) {}

  // ----------------------------------------
  // Reads
  // ----------------------------------------

  get size(): number {
    return this.nodes.size;
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get(id: string): Assumption {
    const node = this.nodes.get(id);
    if (!node) throw new FactNotFoundError(id);
    return clone(node);
  }

  /** All matching assumptions, ordered by numeric id. */
  query(filter: AssumptionQuery = {}): Assumption[] {
    return [...this.nodes.values()]
      .filter((a) => !filter.status || a.status === filter.status)
      .filter((a) => !filter.impact || a.impact === filter.impact)
      .filter((a) => !filter.category || a.category === filter.category)
      .sort((a, b) => idNumber(a.id) - idNumber(b.id))
      .map(clone);
  }

  // ----------------------------------------
  // Mutations
  // ----------------------------------------

  register(input: RegisterAssumptionInput, turn: number): RegisterResult {
    const key = normalizeClaim(input.claim);
    for (const node of this.nodes.values()) {
      if (node.status !== "invalidated" && normalizeClaim(node.claim) === key) {
        return { id: node.id, existing: true, droppedDependencies: [] };
      }
    }

    const requested = [...new Set(input.dependsOn ?? [])];
    const dependsOn = requested.filter((id) => this.nodes.has(id));
    const droppedDependencies = requested.filter((id) => !this.nodes.has(id));

    this.counter += 1;
    const id = `A${this.counter}`;
    this.nodes.set(id, {
      id,
      claim: input.claim.trim(),
      category: input.category,
      impact: input.impact,
      confidence: input.confidence,
      status: "active",
      basis: input.basis,
      surfacedBy: input.surfacedBy,
      dependsOn,
      dependents: [],
      recommendedAction: input.recommendedAction ?? "",
      impliedStakeholders: [...(input.impliedStakeholders ?? [])],
      createdTurn: turn,
      lastUpdatedTurn: turn,
    });

    for (const depId of dependsOn) {
      this.nodes.get(depId)?.dependents.push(id);
    }

    return { id, existing: false, droppedDependencies };
  }

  updateStatus(id: string, status: AssumptionStatus, reason: string, turn: number): CascadeReport {
    const node = this.nodes.get(id);
    if (!node) throw new FactNotFoundError(id);

    const previousStatus = node.status;
    if (previousStatus === status) {
      return { id, previousStatus, status, changed: false, effects: [], truncated: false };
    }

    node.status = status;
    node.lastUpdatedTurn = turn;

    if (status === "invalidated") {
      const { effects, truncated } = this.cascadeInvalidation(node, reason, turn);
      return { id, previousStatus, status, changed: true, effects, truncated };
    }

    if (status === "confirmed") {
      const effects: CascadeEffect[] = [];
      for (const depId of node.dependents) {
        const dep = this.nodes.get(depId);
        if (dep && dep.confidence === "guessed") {
          dep.confidence = "informed";
          dep.lastUpdatedTurn = turn;
          effects.push({ id: dep.id, change: "confidence_upgraded", path: [id, dep.id] });
        }
      }
      return { id, previousStatus, status, changed: true, effects, truncated: false };
    }

    return { id, previousStatus, status, changed: true, effects: [], truncated: false };
  }

  /** A change is noted in the basis with its reason. */
  updateConfidence(id: string, confidence: Confidence, reason: string, turn: number): { previous: Confidence; changed: boolean } {
    const node = this.nodes.get(id);
    if (!node) throw new FactNotFoundError(id);
    const previous = node.confidence;
    if (previous === confidence) return { previous, changed: false };
    node.confidence = confidence;
    appendNote(node, confidenceNote(previous, confidence, reason));
    node.lastUpdatedTurn = turn;
    return { previous, changed: true };
  }

  private cascadeInvalidation(origin: Assumption, reason: string, turn: number): { effects: CascadeEffect[]; truncated: boolean } {
    const effects: CascadeEffect[] = [];
    const visited = new Set<string>([origin.id]);
    let truncated = false;

    let frontier: string[][] = origin.dependents.map((depId) => [origin.id, depId]);
    for (let depth = 1; frontier.length > 0; depth++) {
      if (depth > this.cascadeDepth) {
        truncated = frontier.some((path) => !visited.has(path[path.length - 1]));
        break;
      }

      const next: string[][] = [];
      for (const path of frontier) {
        const targetId = path[path.length - 1];
        if (visited.has(targetId)) continue;
        visited.add(targetId);

        const target = this.nodes.get(targetId);
        if (!target) continue;

        if (target.status === "active") {
          target.status = "at_risk";
          appendNote(target, cascadeNote(origin.id, reason, path));
          target.lastUpdatedTurn = turn;
          effects.push({ id: targetId, change: "at_risk", path });
        }

        for (const childId of target.dependents) {
          if (!visited.has(childId)) next.push([...path, childId]);
        }
      }
      frontier = next;
    }

    return { effects, truncated };
  }

  // ----------------------------------------
  // Snapshot
  // ----------------------------------------

  toJSON(): { assumptions: Assumption[]; counter: number } {
    return { assumptions: this.query(), counter: this.counter };
  }

  /**
   * Inverse edges are rebuilt from dependsOn; stored dependents are
   * ignored and links to unknown ids are dropped.
   */
  static fromJSON(data: { assumptions: Assumption[]; counter: number }, cascadeDepth?: number): AssumptionGraph {
    const graph = new AssumptionGraph(cascadeDepth);
    for (const a of data.assumptions) graph.nodes.set(a.id, { ...clone(a), dependents: [] });
    for (const node of graph.nodes.values()) {
      node.dependsOn = [...new Set(node.dependsOn)].filter((depId) => depId !== node.id && graph.nodes.has(depId));
      for (const depId of node.dependsOn) graph.nodes.get(depId)?.dependents.push(node.id);
    }
    const highest = Math.max(0, ...data.assumptions.map((a) => idNumber(a.id)));
    graph.counter = Math.max(data.counter, highest);
    return graph;
  }
}
