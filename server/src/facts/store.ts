/**
 * Fact Store
 *
 * One per conversation. Owns the assumption graph and the finding
 * skeleton; every mutation is synchronous so a cascade always sees a
 * consistent graph. The conversation worker serializes turns.
 */

import { AssumptionGraph, DEFAULT_CASCADE_DEPTH } from "./assumptions.js";
import { Skeleton, type ConversationMode } from "./skeleton.js";
import type {
  Assumption,
  AssumptionQuery,
  AssumptionStatus,
  CascadeReport,
  Confidence,
  FactStoreSnapshot,
  FindingSkeleton,
  RegisterAssumptionInput,
  RegisterResult,
} from "./types.js";

export class FactStore {
  private graph: AssumptionGraph;
  private skeletonState: Skeleton;

  constructor(private readonly cascadeDepth = DEFAULT_CASCADE_DEPTH) {
    this.graph = new AssumptionGraph(cascadeDepth);
    this.skeletonState = new Skeleton();
  }

  // ----------------------------------------
  // Assumptions
  // ----------------------------------------

  registerAssumption(input: RegisterAssumptionInput, turn: number): RegisterResult {
    return this.graph.register(input, turn);
  }

  /** Throws FactNotFoundError for unknown ids, before any mutation. */
  updateStatus(id: string, status: AssumptionStatus, reason: string, turn: number): CascadeReport {
    return this.graph.updateStatus(id, status, reason, turn);
  }

  updateConfidence(id: string, confidence: Confidence, reason: string, turn: number): { previous: Confidence; changed: boolean } {
    return this.graph.updateConfidence(id, confidence, reason, turn);
  }

  getAssumption(id: string): Assumption {
    return this.graph.get(id);
  }

  hasAssumption(id: string): boolean {
    return this.graph.has(id);
  }

  query(filter?: AssumptionQuery): Assumption[] {
    return this.graph.query(filter);
  }

  // ----------------------------------------
  // Skeleton
  // ----------------------------------------

  /** Single-field setters live on the skeleton itself. */
  get skeleton(): Skeleton {
    return this.skeletonState;
  }

  get skeletonValue(): FindingSkeleton {
    return this.skeletonState.value;
  }

  clearModeFields(mode: ConversationMode): string[] {
    return this.skeletonState.clearModeFields(mode);
  }

  // ----------------------------------------
  // Snapshot
  // ----------------------------------------

  snapshot(): FactStoreSnapshot {
    const { assumptions, counter } = this.graph.toJSON();
    return {
      assumptions,
      assumptionCounter: counter,
      skeleton: this.skeletonState.value,
      stakeholderCounter: this.skeletonState.counter,
    };
  }

  static restore(snapshot: FactStoreSnapshot, cascadeDepth = DEFAULT_CASCADE_DEPTH): FactStore {
    const store = new FactStore(cascadeDepth);
    store.graph = AssumptionGraph.fromJSON({ assumptions: snapshot.assumptions, counter: snapshot.assumptionCounter }, cascadeDepth);
    store.skeletonState = new Skeleton(snapshot.skeleton, snapshot.stakeholderCounter);
    return store;
  }
}
