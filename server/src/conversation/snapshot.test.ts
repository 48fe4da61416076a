/**
 * Snapshot Tests
 */

import { describe, it, expect } from "vitest";
import { SNAPSHOT_VERSION, restoreConversation, snapshotConversation, snapshotId } from "./snapshot.js";
import { createConversationState } from "./state.js";
import { InvalidSnapshotError } from "../errors.js";

const options = { id: "c9", cascadeDepth: 8 };

describe("snapshotConversation", () => {
  it("stamps the schema version and save time", () => {
    const state = createConversationState("c1", { projectName: "Onboarding", now: new Date("2026-01-05T10:00:00Z") });
    const snap = snapshotConversation(state, new Date("2026-01-06T09:30:00Z"));

    expect(snap.schemaVersion).toBe(SNAPSHOT_VERSION);
    expect(snap.id).toBe("c1");
    expect(snap.projectName).toBe("Onboarding");
    expect(snap.createdAt).toBe("2026-01-05T10:00:00.000Z");
    expect(snap.savedAt).toBe("2026-01-06T09:30:00.000Z");
  });

  it("copies state instead of sharing it", () => {
    const state = createConversationState("c1");
    const snap = snapshotConversation(state);
    state.messages.push({ role: "user", content: "later", turn: 1 });
    expect(snap.messages).toEqual([]);
  });
});

describe("restoreConversation", () => {
  it("fills everything missing from fresh defaults", () => {
    const state = restoreConversation({ schemaVersion: "1.0", id: "old" }, options);

    expect(state.id).toBe("c9");
    expect(state.turnCount).toBe(0);
    expect(state.phase).toBe("gathering");
    expect(state.activeMode).toBeNull();
    expect(state.routing.conversationSummary).toBe("");
    expect(state.routing.lastDecision).toBeNull();
    expect(state.org.enrichmentCount).toBe(0);
    expect(state.facts.skeletonValue.decisionCriteria).toEqual({ proceed_if: [], do_not_proceed_if: [] });
    expect(state.project.fileSummaries).toEqual([]);
  });

  it("derives the phase from the active mode", () => {
    const state = restoreConversation(
      { schemaVersion: "1.0", id: "old", phase: "gathering", activeMode: "discover_frame", routing: { modeTurnCount: 2 } },
      options,
    );
    expect(state.phase).toBe("mode_active");
    expect(state.routing.modeTurnCount).toBe(2);
  });

  it("round-trips assumptions and keeps numbering going", () => {
    const original = createConversationState("c1");
    original.turnCount = 2;
    original.facts.registerAssumption(
      { claim: "Admins churn early", category: "value", impact: "high", confidence: "guessed", basis: "user", surfacedBy: "Why Now" },
      1,
    );
    original.facts.skeleton.addStakeholder({ name: "VP Sales", type: "decision_authority" });

    const state = restoreConversation(JSON.parse(JSON.stringify(snapshotConversation(original))), options);
    const next = state.facts.registerAssumption(
      { claim: "Setup takes too long", category: "technical", impact: "medium", confidence: "informed", basis: "logs", surfacedBy: "Why Now" },
      2,
    );

    expect(state.facts.getAssumption("A1").claim).toBe("Admins churn early");
    expect(next.id).toBe("A2");
    expect(state.facts.skeleton.addStakeholder({ name: "Support lead", type: "pain_holder" }).id).toBe("S2");
  });

  it("continues stakeholder ids past a stale counter", () => {
    const state = restoreConversation(
      {
        schemaVersion: "1.0",
        id: "old",
        facts: {
          skeleton: {
            stakeholders: [
              { id: "S1", name: "VP Sales", type: "decision_authority" },
              { id: "S2", name: "Support lead", type: "pain_holder" },
            ],
          },
          stakeholderCounter: 0,
        },
      },
      options,
    );
    expect(state.facts.skeleton.addStakeholder({ name: "CFO", type: "decision_authority" }).id).toBe("S3");
  });

  it("restores dependency links so invalidation still cascades", () => {
    const assumption = (id: string, dependsOn: string[]) => ({
      id,
      claim: `claim ${id}`,
      category: "value",
      impact: "high",
      confidence: "guessed",
      status: "active",
      dependsOn,
    });
    const state = restoreConversation(
      { schemaVersion: "1.0", id: "old", facts: { assumptions: [assumption("A1", []), assumption("A2", ["A1"])], assumptionCounter: 2 } },
      options,
    );

    expect(state.facts.getAssumption("A1").dependents).toEqual(["A2"]);
    const report = state.facts.updateStatus("A1", "invalidated", "pilot was cancelled", 3);
    expect(report.effects).toEqual([{ id: "A2", change: "at_risk", path: ["A1", "A2"] }]);
    expect(state.facts.getAssumption("A2").status).toBe("at_risk");
  });

  it("keeps the saved id unless told otherwise", () => {
    expect(restoreConversation({ schemaVersion: "1.0", id: "old" }, { cascadeDepth: 8 }).id).toBe("old");
  });

  it("reads the conversation id and refuses one unfit for a path", () => {
    expect(snapshotId({ schemaVersion: "1.0", id: "k3Jd9x_-" })).toBe("k3Jd9x_-");
    expect(() => snapshotId({ id: "../other" })).toThrow(InvalidSnapshotError);
  });

  it("accepts a newer minor version", () => {
    expect(restoreConversation({ schemaVersion: "1.1", id: "old", turnCount: 5 }, options).turnCount).toBe(5);
  });

  it("rejects another major version", () => {
    expect(() => restoreConversation({ schemaVersion: "2.0", id: "old" }, options)).toThrow(
      "Unsupported snapshot version 2.0 (expected 1.0)",
    );
  });

  it("names the invalid field", () => {
    const input = {
      schemaVersion: "1.0",
      id: "old",
      facts: {
        assumptions: [
          { id: "A1", claim: "x", category: "value", impact: "high", confidence: "guessed", status: "maybe" },
        ],
      },
    };
    expect(() => restoreConversation(input, options)).toThrow(InvalidSnapshotError);
    expect(() => restoreConversation(input, options)).toThrow(/facts\.assumptions\.0\.status/);
  });

  it("rejects something that is not a snapshot", () => {
    expect(() => restoreConversation("hello", options)).toThrow("Invalid snapshot: (root): Expected object, received string");
  });
});
