/**
 * Finding Skeleton
 *
 * The partially-filled work product. Each setter changes one named field;
 * there is no bulk rewrite. Setters report whether anything changed so
 * repeated tool calls are harmless.
 */

import type {
  CriteriaType,
  FindingSkeleton,
  GoNoGo,
  RiskAssessment,
  RiskDimension,
  Stakeholder,
  StakeholderType,
  SuccessMetrics,
  ValidationPlan,
} from "./types.js";

export type ConversationMode = "discover_frame" | "solution_evaluation";

export function emptySkeleton(): FindingSkeleton {
  return {
    problemStatement: null,
    targetAudience: null,
    stakeholders: [],
    successMetrics: { leading: null, lagging: null, antiMetric: null },
    decisionCriteria: { proceed_if: [], do_not_proceed_if: [] },
    constraints: [],
    solutionName: null,
    solutionDescription: null,
    buildVsBuy: null,
    risks: {},
    validationPlan: null,
    goNoGo: null,
  };
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function sameList(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

export class Skeleton {
  private data: FindingSkeleton;
  private stakeholderCounter: number;

  constructor(data: FindingSkeleton = emptySkeleton(), stakeholderCounter = data.stakeholders.length) {
    this.data = structuredClone(data);
    this.stakeholderCounter = stakeholderCounter;
  }

  get value(): FindingSkeleton {
    return structuredClone(this.data);
  }

  get counter(): number {
    return this.stakeholderCounter;
  }

  setProblemStatement(text: string): boolean {
    if (this.data.problemStatement === text) return false;
    this.data.problemStatement = text;
    return true;
  }

  setTargetAudience(text: string): boolean {
    if (this.data.targetAudience === text) return false;
    this.data.targetAudience = text;
    return true;
  }

  /**
   * Adds a stakeholder, or updates the existing one with the same name
   * (case-insensitive). Returns the stakeholder id.
   */
  addStakeholder(input: { name: string; type: StakeholderType; validated?: boolean; notes?: string }): { id: string; created: boolean } {
    const existing = this.data.stakeholders.find((s) => sameText(s.name, input.name));
    if (existing) {
      existing.type = input.type;
      if (input.validated !== undefined) existing.validated = input.validated;
      if (input.notes) existing.notes = input.notes;
      return { id: existing.id, created: false };
    }
    this.stakeholderCounter += 1;
    const stakeholder: Stakeholder = {
      id: `S${this.stakeholderCounter}`,
      name: input.name.trim(),
      type: input.type,
      validated: input.validated ?? false,
      notes: input.notes ?? "",
    };
    this.data.stakeholders.push(stakeholder);
    return { id: stakeholder.id, created: true };
  }

  /** Only the provided fields change. */
  setSuccessMetrics(update: Partial<SuccessMetrics>): boolean {
    let changed = false;
    for (const key of ["leading", "lagging", "antiMetric"] as const) {
      const next = update[key];
      if (next !== undefined && this.data.successMetrics[key] !== next) {
        this.data.successMetrics[key] = next;
        changed = true;
      }
    }
    return changed;
  }

  addDecisionCriterion(type: CriteriaType, condition: string): boolean {
    const list = this.data.decisionCriteria[type];
    if (list.some((c) => sameText(c, condition))) return false;
    list.push(condition);
    return true;
  }

  addConstraint(constraint: string): boolean {
    if (this.data.constraints.some((c) => sameText(c, constraint))) return false;
    this.data.constraints.push(constraint);
    return true;
  }

  setSolutionInfo(name: string, description: string, buildVsBuy?: string): boolean {
    const changed =
      this.data.solutionName !== name ||
      this.data.solutionDescription !== description ||
      (!!buildVsBuy && this.data.buildVsBuy !== buildVsBuy);
    this.data.solutionName = name;
    this.data.solutionDescription = description;
    if (buildVsBuy) this.data.buildVsBuy = buildVsBuy;
    return changed;
  }

  /** Evidence lists keep their previous value when omitted. */
  setRiskAssessment(
    dimension: RiskDimension,
    input: { level: RiskAssessment["level"]; summary: string; evidenceFor?: string[]; evidenceAgainst?: string[] },
  ): boolean {
    const previous = this.data.risks[dimension];
    const next: RiskAssessment = {
      level: input.level,
      summary: input.summary,
      evidenceFor: input.evidenceFor ?? previous?.evidenceFor ?? [],
      evidenceAgainst: input.evidenceAgainst ?? previous?.evidenceAgainst ?? [],
    };
    const changed =
      !previous ||
      previous.level !== next.level ||
      previous.summary !== next.summary ||
      !sameList(previous.evidenceFor, next.evidenceFor) ||
      !sameList(previous.evidenceAgainst, next.evidenceAgainst);
    this.data.risks[dimension] = next;
    return changed;
  }

  setValidationPlan(plan: ValidationPlan): boolean {
    const previous = this.data.validationPlan;
    this.data.validationPlan = { ...plan };
    return JSON.stringify(previous) !== JSON.stringify(plan);
  }

  setGoNoGo(decision: GoNoGo): boolean {
    const previous = this.data.goNoGo;
    this.data.goNoGo = { ...decision, conditions: [...decision.conditions], dealbreakers: [...decision.dealbreakers] };
    return JSON.stringify(previous) !== JSON.stringify(this.data.goNoGo);
  }

  /**
   * Clears the sub-goal fields owned by a completed mode. Discovery
   * fields feed solution evaluation, so completing discovery clears nothing.
   */
  clearModeFields(mode: ConversationMode): string[] {
    if (mode === "discover_frame") return [];
    this.data.solutionName = null;
    this.data.solutionDescription = null;
    this.data.buildVsBuy = null;
    this.data.risks = {};
    this.data.validationPlan = null;
    this.data.goNoGo = null;
    return ["solutionName", "solutionDescription", "buildVsBuy", "risks", "validationPlan", "goNoGo"];
  }
}
