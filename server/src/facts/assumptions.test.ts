/**
 * Assumption Graph Tests
 *
 * Registration, dedup, dependency wiring and the status cascade.
 */

import { describe, it, expect } from "vitest";
import { AssumptionGraph, cascadeNote } from "./assumptions.js";
import { FactNotFoundError } from "../errors.js";
import type { Assumption, RegisterAssumptionInput } from "./types.js";

function input(claim: string, dependsOn: string[] = []): RegisterAssumptionInput {
  return {
    claim,
    category: "value",
    impact: "high",
    confidence: "guessed",
    basis: "user said so",
    surfacedBy: "problem_probe",
    dependsOn,
  };
}

/** Stored as a snapshot would hold it: edges on the dependent side only. */
function node(id: string, dependsOn: string[], status: Assumption["status"] = "active"): Assumption {
  return {
    id,
    claim: `claim ${id}`,
    category: "technical",
    impact: "medium",
    confidence: "guessed",
    status,
    basis: "",
    surfacedBy: "test",
    dependsOn,
    dependents: [],
    recommendedAction: "",
    impliedStakeholders: [],
    createdTurn: 1,
    lastUpdatedTurn: 1,
  };
}

// ============================================
// REGISTRATION
// ============================================

describe("AssumptionGraph.register", () => {
  it("assigns sequential ids and maintains inverse edges", () => {
    const graph = new AssumptionGraph();
    const a1 = graph.register(input("Users churn because onboarding is slow"), 1);
    const a2 = graph.register(input("Faster onboarding reduces churn", ["A1"]), 2);

    expect(a1).toEqual({ id: "A1", existing: false, droppedDependencies: [] });
    expect(a2.id).toBe("A2");
    expect(graph.get("A1").dependents).toEqual(["A2"]);
    expect(graph.get("A2").dependsOn).toEqual(["A1"]);
    expect(graph.get("A2").createdTurn).toBe(2);
  });

  it("drops dependencies on unknown ids and reports them", () => {
    const graph = new AssumptionGraph();
    graph.register(input("first"), 1);
    const result = graph.register(input("second", ["A1", "A7"]), 1);

    expect(result.droppedDependencies).toEqual(["A7"]);
    expect(graph.get("A2").dependsOn).toEqual(["A1"]);
  });

  it("returns the existing id for a repeated claim", () => {
    const graph = new AssumptionGraph();
    graph.register(input("Teams  want weekly reports"), 1);
    const again = graph.register(input("teams want weekly reports "), 2);

    expect(again).toEqual({ id: "A1", existing: true, droppedDependencies: [] });
    expect(graph.size).toBe(1);
  });

  it("allows re-registering a claim that was invalidated", () => {
    const graph = new AssumptionGraph();
    graph.register(input("Budget is approved"), 1);
    graph.updateStatus("A1", "invalidated", "finance said no", 2);
    const again = graph.register(input("Budget is approved"), 3);

    expect(again.id).toBe("A2");
    expect(again.existing).toBe(false);
  });
});

// ============================================
// INVALIDATION CASCADE
// ============================================

describe("AssumptionGraph.updateStatus (invalidated)", () => {
  it("flags a direct dependent at_risk with a basis note", () => {
    const graph = new AssumptionGraph();
    graph.register(input("Sales owns the pipeline data"), 1);
    graph.register(input("Sales will share the pipeline export", ["A1"]), 1);

    const report = graph.updateStatus("A1", "invalidated", "Marketing owns it", 3);

    expect(report.changed).toBe(true);
    expect(report.previousStatus).toBe("active");
    expect(report.effects).toEqual([{ id: "A2", change: "at_risk", path: ["A1", "A2"] }]);
    const a2 = graph.get("A2");
    expect(a2.status).toBe("at_risk");
    expect(a2.basis).toBe("user said so\n⚠️ Dependency A1 was invalidated: Marketing owns it");
    expect(a2.lastUpdatedTurn).toBe(3);
  });

  it("names intermediate hops for transitive dependents", () => {
    const graph = new AssumptionGraph();
    graph.register(input("one"), 1);
    graph.register(input("two", ["A1"]), 1);
    graph.register(input("three", ["A2"]), 1);

    graph.updateStatus("A1", "invalidated", "wrong", 2);

    expect(graph.get("A3").basis).toBe("user said so\n⚠️ Dependency A1 was invalidated: wrong (via A2)");
  });

  it("marks a diamond's shared descendant exactly once", () => {
    const graph = new AssumptionGraph();
    graph.register(input("root"), 1);
    graph.register(input("left", ["A1"]), 1);
    graph.register(input("right", ["A1"]), 1);
    graph.register(input("bottom", ["A2", "A3"]), 1);

    const report = graph.updateStatus("A1", "invalidated", "gone", 2);

    expect(report.effects.map((e) => e.id)).toEqual(["A2", "A3", "A4"]);
    expect(graph.get("A4").basis.split("\n")).toHaveLength(2);
  });

  it("leaves confirmed dependents alone but walks through them", () => {
    const graph = new AssumptionGraph();
    graph.register(input("root"), 1);
    graph.register(input("middle", ["A1"]), 1);
    graph.register(input("leaf", ["A2"]), 1);
    graph.updateStatus("A2", "confirmed", "checked", 1);

    const report = graph.updateStatus("A1", "invalidated", "gone", 2);

    expect(graph.get("A2").status).toBe("confirmed");
    expect(graph.get("A3").status).toBe("at_risk");
    expect(report.effects).toEqual([{ id: "A3", change: "at_risk", path: ["A1", "A2", "A3"] }]);
  });

  it("is a no-op when the status is already set", () => {
    const graph = new AssumptionGraph();
    graph.register(input("root"), 1);
    graph.register(input("child", ["A1"]), 1);
    graph.updateStatus("A1", "invalidated", "first", 2);
    const basisAfterFirst = graph.get("A2").basis;

    const report = graph.updateStatus("A1", "invalidated", "second", 3);

    expect(report).toEqual({ id: "A1", previousStatus: "invalidated", status: "invalidated", changed: false, effects: [], truncated: false });
    expect(graph.get("A2").basis).toBe(basisAfterFirst);
  });

  it("stops at the depth bound and reports truncation", () => {
    const nodes: Assumption[] = [];
    for (let i = 1; i <= 5; i++) nodes.push(node(`A${i}`, i > 1 ? [`A${i - 1}`] : []));
    const graph = AssumptionGraph.fromJSON({ assumptions: nodes, counter: 5 }, 2);

    const report = graph.updateStatus("A1", "invalidated", "gone", 2);

    expect(report.truncated).toBe(true);
    expect(report.effects.map((e) => e.id)).toEqual(["A2", "A3"]);
    expect(graph.get("A4").status).toBe("active");
  });

  it("terminates on cycles", () => {
    const graph = AssumptionGraph.fromJSON({
      assumptions: [node("A1", ["A3"]), node("A2", ["A1"]), node("A3", ["A2"])],
      counter: 3,
    });

    const report = graph.updateStatus("A1", "invalidated", "loop", 2);

    expect(report.effects.map((e) => e.id)).toEqual(["A2", "A3"]);
    expect(report.truncated).toBe(false);
    expect(graph.get("A1").status).toBe("invalidated");
  });

  it("throws FactNotFoundError for unknown ids without mutating", () => {
    const graph = new AssumptionGraph();
    graph.register(input("only"), 1);

    expect(() => graph.updateStatus("A9", "invalidated", "x", 2)).toThrow(FactNotFoundError);
    expect(graph.get("A1").status).toBe("active");
  });
});

// ============================================
// CONFIRMATION / CONFIDENCE
// ============================================

describe("AssumptionGraph confirmation and confidence", () => {
  it("upgrades guessed direct dependents to informed", () => {
    const graph = new AssumptionGraph();
    graph.register(input("root"), 1);
    graph.register(input("child", ["A1"]), 1);
    graph.register({ ...input("validated child", ["A1"]), confidence: "validated" }, 1);

    const report = graph.updateStatus("A1", "confirmed", "interviews", 2);

    expect(report.effects).toEqual([{ id: "A2", change: "confidence_upgraded", path: ["A1", "A2"] }]);
    expect(graph.get("A2").confidence).toBe("informed");
    expect(graph.get("A3").confidence).toBe("validated");
  });

  it("reports whether confidence changed", () => {
    const graph = new AssumptionGraph();
    graph.register(input("root"), 1);

    expect(graph.updateConfidence("A1", "informed", "two interviews", 2)).toEqual({ previous: "guessed", changed: true });
    expect(graph.updateConfidence("A1", "informed", "again", 3)).toEqual({ previous: "informed", changed: false });
    expect(graph.get("A1").basis).toBe("user said so\nConfidence guessed → informed: two interviews");
    expect(graph.get("A1").lastUpdatedTurn).toBe(2);
  });

  it("rebuilds inverse edges from dependsOn when loading", () => {
    const graph = AssumptionGraph.fromJSON({
      assumptions: [node("A1", []), { ...node("A2", ["A1", "A1", "A7"]), dependents: ["A9"] }, node("A3", ["A2", "A3"])],
      counter: 3,
    });

    expect(graph.get("A1").dependents).toEqual(["A2"]);
    expect(graph.get("A2").dependents).toEqual(["A3"]);
    expect(graph.get("A2").dependsOn).toEqual(["A1"]);
    expect(graph.get("A3").dependsOn).toEqual(["A2"]);

    const report = graph.updateStatus("A1", "invalidated", "churn is seasonal", 4);
    expect(report.effects.map((e) => [e.id, e.change])).toEqual([
      ["A2", "at_risk"],
      ["A3", "at_risk"],
    ]);
  });
});

describe("cascadeNote", () => {
  it("joins intermediate hops with arrows", () => {
    expect(cascadeNote("A1", "r", ["A1", "A2", "A3", "A4"])).toBe("⚠️ Dependency A1 was invalidated: r (via A2 → A3)");
  });
});
