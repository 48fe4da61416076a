/**
 * Fact Store Types
 *
 * The assumption dependency graph and the finding skeleton that together
 * make up a conversation's structured work product.
 */

// ============================================
// ASSUMPTIONS
// ============================================

export const ASSUMPTION_CATEGORIES = ["value", "technical", "stakeholder_dependency", "market", "organizational"] as const;
export const IMPACT_LEVELS = ["high", "medium", "low"] as const;
export const CONFIDENCE_LEVELS = ["validated", "informed", "guessed"] as const;
export const ASSUMPTION_STATUSES = ["active", "at_risk", "invalidated", "confirmed"] as const;

export type AssumptionCategory = (typeof ASSUMPTION_CATEGORIES)[number];
export type Impact = (typeof IMPACT_LEVELS)[number];
export type Confidence = (typeof CONFIDENCE_LEVELS)[number];
export type AssumptionStatus = (typeof ASSUMPTION_STATUSES)[number];

export interface Assumption {
  /** Sequential per conversation: A1, A2, ... */
  id: string;
  claim: string;
  category: AssumptionCategory;
  impact: Impact;
  confidence: Confidence;
  status: AssumptionStatus;
  /** Where the claim came from; cascade notes are appended here */
  basis: string;
  /** Probe or pattern that surfaced it */
  surfacedBy: string;
  dependsOn: string[];
  /** Inverse of dependsOn, maintained by the graph */
  dependents: string[];
  recommendedAction: string;
  impliedStakeholders: string[];
  createdTurn: number;
  lastUpdatedTurn: number;
}

export interface RegisterAssumptionInput {
  claim: string;
  category: AssumptionCategory;
  impact: Impact;
  confidence: Confidence;
  basis: string;
  surfacedBy: string;
  dependsOn?: string[];
  recommendedAction?: string;
  impliedStakeholders?: string[];
}

export interface RegisterResult {
  id: string;
  /** True when an identical live claim already existed */
  existing: boolean;
  /** dependsOn ids that named no known assumption */
  droppedDependencies: string[];
}

export interface CascadeEffect {
  id: string;
  change: "at_risk" | "confidence_upgraded";
  /** Path from the changed node, e.g. ["A1", "A2", "A4"] */
  path: string[];
}

export interface CascadeReport {
  id: string;
  previousStatus: AssumptionStatus;
  status: AssumptionStatus;
  /** False when the status was already set (no cascade ran) */
  changed: boolean;
  effects: CascadeEffect[];
  /** Nodes beyond the depth bound that were not visited */
  truncated: boolean;
}

export interface AssumptionQuery {
  status?: AssumptionStatus;
  impact?: Impact;
  category?: AssumptionCategory;
}

// ============================================
// FINDING SKELETON
// ============================================

export const STAKEHOLDER_TYPES = ["decision_authority", "pain_holder", "status_quo_beneficiary", "execution_dependency"] as const;
export const RISK_DIMENSIONS = ["value", "usability", "feasibility", "viability"] as const;
export const RISK_LEVELS = ["low", "medium", "high"] as const;
export const VALIDATION_APPROACHES = ["painted_door", "concierge", "technical_spike", "wizard_of_oz", "prototype", "other"] as const;
export const GO_NO_GO = ["go", "conditional_go", "pivot", "no_go"] as const;
export const CRITERIA_TYPES = ["proceed_if", "do_not_proceed_if"] as const;

export type StakeholderType = (typeof STAKEHOLDER_TYPES)[number];
export type RiskDimension = (typeof RISK_DIMENSIONS)[number];
export type RiskLevel = (typeof RISK_LEVELS)[number];
export type ValidationApproach = (typeof VALIDATION_APPROACHES)[number];
export type GoNoGoRecommendation = (typeof GO_NO_GO)[number];
export type CriteriaType = (typeof CRITERIA_TYPES)[number];

export interface Stakeholder {
  /** S1, S2, ... */
  id: string;
  name: string;
  type: StakeholderType;
  validated: boolean;
  notes: string;
}

export interface SuccessMetrics {
  leading: string | null;
  lagging: string | null;
  antiMetric: string | null;
}

export interface RiskAssessment {
  level: RiskLevel;
  summary: string;
  evidenceFor: string[];
  evidenceAgainst: string[];
}

export interface ValidationPlan {
  /** Assumption id, e.g. A5 */
  riskiestAssumption: string;
  approach: ValidationApproach;
  description: string;
  timeline: string | null;
  successCriteria: string;
}

export interface GoNoGo {
  recommendation: GoNoGoRecommendation;
  conditions: string[];
  dealbreakers: string[];
}

export interface FindingSkeleton {
  problemStatement: string | null;
  targetAudience: string | null;
  stakeholders: Stakeholder[];
  successMetrics: SuccessMetrics;
  decisionCriteria: Record<CriteriaType, string[]>;
  constraints: string[];
  solutionName: string | null;
  solutionDescription: string | null;
  buildVsBuy: string | null;
  risks: Partial<Record<RiskDimension, RiskAssessment>>;
  validationPlan: ValidationPlan | null;
  goNoGo: GoNoGo | null;
}

// ============================================
// SNAPSHOT
// ============================================

export interface FactStoreSnapshot {
  assumptions: Assumption[];
  assumptionCounter: number;
  skeleton: FindingSkeleton;
  stakeholderCounter: number;
}
