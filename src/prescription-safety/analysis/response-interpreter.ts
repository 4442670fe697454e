import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  AnalysisResult,
  INTERACTION_SEVERITIES,
  InteractionFinding,
  MonitoringItem,
  RISK_LEVELS,
  RiskLevel,
  SafetyFindings,
} from '../types/analysis.types';

export const DEFAULT_AI_SUMMARY =
  'Analysis completed. Review individual sections for details.';

const RAW_EXCERPT_LENGTH = 200;

const text = z.string().catch('');

const interactionSchema = z.object({
  drugs: z.array(z.string()).catch([]),
  severity: z.enum(INTERACTION_SEVERITIES).catch('moderate'),
  description: text,
  recommendation: text,
});

const allergySchema = z.object({
  drug: text,
  allergy: text,
  risk: text,
});

const contraindicationSchema = z.object({
  drug: text,
  condition: text,
  risk: text,
});

const alternativeSchema = z
  .object({
    instead_of: text,
    suggested: text,
    reason: text,
  })
  .transform(({ instead_of, suggested, reason }) => ({
    insteadOf: instead_of,
    suggested,
    reason,
  }));

const monitoringSchema = z.object({
  parameter: text,
  frequency: text,
  reason: text,
});

/** Keeps the items that are objects, coercing their fields; anything else becomes an empty list. */
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((entries) =>
      entries.flatMap((entry): z.output<T>[] => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      }),
    );
}

const analysisPayloadSchema = z.object({
  interactions: listOf(interactionSchema),
  allergies: listOf(allergySchema),
  contraindications: listOf(contraindicationSchema),
  alternatives: listOf(alternativeSchema),
  monitoring: listOf(monitoringSchema),
  overall_risk: z.enum(RISK_LEVELS).catch('moderate'),
  summary: z
    .string()
    .catch('')
    .transform((summary) => summary.trim() || DEFAULT_AI_SUMMARY),
});

export interface InterpretOptions {
  medicationNames?: readonly string[];
  analyzedAt?: Date;
}

/**
 * Remove a surrounding ```json / ``` fence from a model response. The
 * language tag matches in any case.
 */
export function stripCodeFence(rawText: string): string {
  let content = rawText.trim().replace(/^```(json)?/i, '');
  if (content.endsWith('```')) {
    content = content.slice(0, -3);
  }
  return content.trim();
}

function parseJsonObject(content: string): object | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return undefined;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return parsed;
}

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

@Injectable()
export class ResponseInterpreter {
  private readonly logger = new Logger(ResponseInterpreter.name);

  /**
   * Turn the model's message content into an AnalysisResult. Never throws:
   * content that is not a JSON object is mined for keywords instead.
   */
  interpret(rawText: string, options: InterpretOptions = {}): AnalysisResult {
    const analyzedAt = options.analyzedAt ?? new Date();
    const content = stripCodeFence(rawText);
    const payload = parseJsonObject(content);

    if (!payload) {
      this.logger.warn(
        'AI response was not valid JSON, extracting findings from text',
      );
      return this.extractFromText(
        content,
        options.medicationNames ?? [],
        analyzedAt,
      );
    }

    const { overall_risk, summary, ...findings } =
      analysisPayloadSchema.parse(payload);

    return {
      ...findings,
      overallRisk: overall_risk,
      summary,
      source: 'ai',
      interpretation: 'structured',
      timestamp: analyzedAt.toISOString(),
    };
  }

  private extractFromText(
    content: string,
    medicationNames: readonly string[],
    analyzedAt: Date,
  ): AnalysisResult {
    const lowered = content.toLowerCase();
    const interactions: InteractionFinding[] = [];
    const monitoring: MonitoringItem[] = [];

    if (containsAny(lowered, ['interaction', 'interact', 'contraindicated'])) {
      interactions.push({
        drugs:
          medicationNames.length >= 2
            ? [...medicationNames]
            : ['Multiple medications'],
        severity: 'moderate',
        description: 'Potential interactions detected in AI analysis',
        recommendation: 'Review full AI response for details',
      });
    }

    if (containsAny(lowered, ['monitor', 'check', 'follow', 'watch'])) {
      monitoring.push({
        parameter: 'General monitoring',
        frequency: 'As clinically indicated',
        reason: 'Based on AI analysis recommendations',
      });
    }

    const findings: SafetyFindings = {
      interactions,
      allergies: [],
      contraindications: [],
      alternatives: [],
      monitoring,
    };

    return {
      ...findings,
      overallRisk: this.riskFromText(lowered),
      summary: `AI analysis completed. Review original response: ${content.slice(0, RAW_EXCERPT_LENGTH)}...`,
      source: 'ai',
      interpretation: 'heuristic',
      timestamp: analyzedAt.toISOString(),
    };
  }

  private riskFromText(lowered: string): RiskLevel {
    if (containsAny(lowered, ['high risk', 'dangerous', 'severe', 'major'])) {
      return 'high';
    }
    if (containsAny(lowered, ['low risk', 'safe', 'minor'])) {
      return 'low';
    }
    return 'moderate';
  }
}
