/**
 * COA Domain Contract
 * ===================
 *
 * Typed records the engine consumes. Produced by the boundary parser
 * (decision.input.contract.ts) and treated as immutable afterwards.
 *
 * INVARIANTS:
 * - threatLevel, protectionPriority, mobility ∈ [0, 1]
 * - COA ids are unique within one decision input
 */

// ═══════════════════════════════════════════════════════════════
// COA
// ═══════════════════════════════════════════════════════════════

export const COA_TYPES = [
  'Defense',
  'Offensive',
  'CounterAttack',
  'Maneuver',
  'Deterrence',
  'Preemptive',
  'InformationOps',
] as const;

export type CoaType = (typeof COA_TYPES)[number];

export type PriorityTier = 'Required' | 'Recommended' | 'Optional';

export interface ResourceRequirement {
  resource: string;
  tier: PriorityTier;
  weight: number;
}

export interface EnvironmentFit {
  compatible: readonly string[];
  incompatible: readonly string[];
}

export interface Coa {
  readonly id: string;
  readonly type: CoaType;
  readonly name: string;
  readonly description: string;

  readonly requiredResources: readonly ResourceRequirement[];
  readonly requiredAssets: readonly string[];

  readonly impactTerrainCellIds: ReadonlySet<string>;
  readonly estimatedDurationHours: number;

  readonly purposeTags: readonly string[];
  readonly environmentFit: EnvironmentFit;
  readonly requiredForceRatio: number;     // friendly : enemy
  readonly mobilityDemand: number;         // 0..1

  /** Warnings raised while the record was converted at the boundary */
  readonly parseWarnings: readonly string[];
}

// ═══════════════════════════════════════════════════════════════
// SITUATION
// ═══════════════════════════════════════════════════════════════

export type ResourceStatus = 'available' | 'maintenance' | 'unavailable';

export interface AvailableResource {
  name: string;
  quantity?: number;
  status: ResourceStatus;
}

export interface AxisState {
  axisId: string;
  friendlyCombatPower: number;
  enemyCombatPower: number;
  mobility?: number;            // 0..1
}

export interface MissionSummary {
  missionId: string;
  missionType?: string;
  objectiveTags: readonly string[];
  priority?: number;            // 1..10
}

/** scope: 'global', a CoaType, or a COA id */
export interface Constraint {
  id: string;
  scope: string;
  timeCritical: boolean;
  maxDurationHours?: number;
}

export interface CivilianArea {
  id: string;
  protectionPriority: number;   // 0..1
  populationDensity: number;    // persons / km²
  cellIds: ReadonlySet<string>;
}

export interface SituationContext {
  readonly situationId: string;
  /** Id of the specific threat, used for per-COA relevance overrides */
  readonly threatId?: string;
  readonly threatLevel: number;
  readonly dominantThreatType: string;
  readonly mission: MissionSummary;
  readonly axisStates: readonly AxisState[];
  readonly terrainTags: readonly string[];
  readonly availableResources: readonly AvailableResource[];
  readonly constraints: readonly Constraint[];
  readonly civilianAreas: readonly CivilianArea[];
}

export interface DecisionInput {
  candidates: readonly Coa[];
  situation: SituationContext;
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function isCoaType(value: string): value is CoaType {
  return (COA_TYPES as readonly string[]).includes(value);
}

export function constraintAppliesTo(constraint: Constraint, coa: Coa): boolean {
  return constraint.scope === 'global' || constraint.scope === coa.type || constraint.scope === coa.id;
}
