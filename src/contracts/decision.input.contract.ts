/**
 * Decision Input Contract
 * =======================
 *
 * Boundary schema for raw decision records. Everything the core consumes
 * passes through parseDecisionInput() first.
 *
 * RULES (LOCKED v1):
 * - threatLevel in (1, 100] is a percentage → divided by 100
 * - protectionPriority accepts High / Medium / Low → 0.9 / 0.5 / 0.2
 * - requiredResources accepts the raw priority string or a parsed list
 * - missing ids, duplicate COA ids, schema failures → CoaInputError
 */

import { z } from 'zod';
import { CoaInputError } from '../common/errors.js';
import { ResourcePriorityParser } from '../modules/resources/resource.parser.js';
import { TIER_WEIGHTS } from '../modules/resources/resource.types.js';
import {
  COA_TYPES,
  type Coa,
  type CivilianArea,
  type DecisionInput,
  type ResourceRequirement,
  type SituationContext,
} from './coa.contract.js';

export const PROTECTION_LABELS: Record<string, number> = {
  high: 0.9,
  medium: 0.5,
  low: 0.2,
};

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const IdSchema = z.string().trim().min(1, 'id is required');
const TagListSchema = z.array(z.string()).default([]);

const ResourceRequirementSchema = z.object({
  resource: z.string().trim().min(1),
  tier: z.enum(['Required', 'Recommended', 'Optional']),
});

export const CoaRecordSchema = z.object({
  id: IdSchema,
  type: z.enum(COA_TYPES),
  name: z.string().default(''),
  description: z.string().default(''),
  requiredResources: z.union([z.string(), z.array(ResourceRequirementSchema)]).default([]),
  requiredAssets: TagListSchema,
  impactTerrainCellIds: TagListSchema,
  estimatedDurationHours: z.number().min(0).default(0),
  purposeTags: TagListSchema,
  environmentFit: z
    .object({
      compatible: TagListSchema,
      incompatible: TagListSchema,
    })
    .default({}),
  requiredForceRatio: z.number().min(0).default(1),
  mobilityDemand: z.number().min(0).max(1).default(0.5),
});

const ProtectionPrioritySchema = z.union([
  z.number().min(0).max(1),
  z.string().transform((label, ctx) => {
    const value = PROTECTION_LABELS[label.trim().toLowerCase()];
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown protection label "${label}"` });
      return z.NEVER;
    }
    return value;
  }),
]);

export const SituationRecordSchema = z.object({
  situationId: IdSchema,
  threatId: z.string().trim().min(1).optional(),
  threatLevel: z.number().min(0).max(100),
  dominantThreatType: z.string().default(''),
  mission: z.object({
    missionId: IdSchema,
    missionType: z.string().optional(),
    objectiveTags: TagListSchema,
    priority: z.number().optional(),
  }),
  axisStates: z
    .array(
      z.object({
        axisId: IdSchema,
        friendlyCombatPower: z.number().min(0),
        enemyCombatPower: z.number().min(0),
        mobility: z.number().min(0).max(1).optional(),
      })
    )
    .default([]),
  terrainTags: TagListSchema,
  availableResources: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        quantity: z.number().min(0).optional(),
        status: z.enum(['available', 'maintenance', 'unavailable']).default('available'),
      })
    )
    .default([]),
  constraints: z
    .array(
      z.object({
        id: IdSchema,
        scope: z.string().default('global'),
        timeCritical: z.boolean().default(false),
        maxDurationHours: z.number().positive().optional(),
      })
    )
    .default([]),
  civilianAreas: z
    .array(
      z.object({
        id: IdSchema,
        protectionPriority: ProtectionPrioritySchema,
        populationDensity: z.number().min(0).default(0),
        cellIds: TagListSchema,
      })
    )
    .default([]),
});

export const DecisionInputRecordSchema = z.object({
  candidates: z.array(CoaRecordSchema),
  situation: SituationRecordSchema,
});

export type CoaRecord = z.input<typeof CoaRecordSchema>;
export type SituationRecord = z.input<typeof SituationRecordSchema>;
export type DecisionInputRecord = z.input<typeof DecisionInputRecordSchema>;

// ═══════════════════════════════════════════════════════════════
// CONVERSION
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a raw record and convert it into engine types.
 * Throws CoaInputError on the first problem.
 */
export function parseDecisionInput(
  raw: unknown,
  parser: ResourcePriorityParser = new ResourcePriorityParser()
): DecisionInput {
  const parsed = DecisionInputRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CoaInputError(issue.path.join('.') || 'input', issue.message);
  }

  const seen = new Set<string>();
  for (const [i, record] of parsed.data.candidates.entries()) {
    if (seen.has(record.id)) {
      throw new CoaInputError(`candidates.${i}.id`, `duplicate COA id "${record.id}"`);
    }
    seen.add(record.id);
  }

  return {
    candidates: parsed.data.candidates.map((record) => toCoa(record, parser)),
    situation: toSituation(parsed.data.situation),
  };
}

function toCoa(record: z.output<typeof CoaRecordSchema>, parser: ResourcePriorityParser): Coa {
  let requiredResources: ResourceRequirement[];
  let parseWarnings: string[] = [];

  if (typeof record.requiredResources === 'string') {
    const result = parser.parse(record.requiredResources);
    requiredResources = result.requirements;
    parseWarnings = result.warnings;
  } else {
    requiredResources = record.requiredResources.map((req) => ({
      resource: req.resource,
      tier: req.tier,
      weight: TIER_WEIGHTS[req.tier],
    }));
  }

  return Object.freeze({
    id: record.id,
    type: record.type,
    name: record.name || record.id,
    description: record.description,
    requiredResources,
    requiredAssets: record.requiredAssets,
    impactTerrainCellIds: new Set(record.impactTerrainCellIds),
    estimatedDurationHours: record.estimatedDurationHours,
    purposeTags: record.purposeTags,
    environmentFit: record.environmentFit,
    requiredForceRatio: record.requiredForceRatio,
    mobilityDemand: record.mobilityDemand,
    parseWarnings,
  });
}

function toSituation(record: z.output<typeof SituationRecordSchema>): SituationContext {
  const civilianAreas: CivilianArea[] = record.civilianAreas.map((area) => ({
    id: area.id,
    protectionPriority: area.protectionPriority,
    populationDensity: area.populationDensity,
    cellIds: new Set(area.cellIds),
  }));

  return Object.freeze({
    situationId: record.situationId,
    threatId: record.threatId,
    threatLevel: normalizeThreatLevel(record.threatLevel),
    dominantThreatType: record.dominantThreatType.trim(),
    mission: record.mission,
    axisStates: record.axisStates,
    terrainTags: record.terrainTags,
    availableResources: record.availableResources,
    constraints: record.constraints,
    civilianAreas,
  });
}

export function normalizeThreatLevel(value: number): number {
  return value > 1 ? value / 100 : value;
}
