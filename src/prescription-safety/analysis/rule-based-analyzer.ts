import { Injectable } from '@nestjs/common';
import {
  CONTRAINDICATION_PATTERNS,
  INTERACTION_PATTERNS,
  MONITORING_PATTERNS,
  NO_ALLERGY_SENTINELS,
} from '../constants/safety-patterns';
import {
  AllergyFinding,
  AnalysisResult,
  ContraindicationFinding,
  InteractionFinding,
  MedicationItem,
  MonitoringItem,
  PatientContext,
  RiskLevel,
} from '../types/analysis.types';
import { splitDelimitedList, toTitleCase } from '../utils/text';

interface NormalizedMedication {
  displayName: string;
  name: string;
  genericName: string;
}

function normalize(medication: MedicationItem): NormalizedMedication {
  return {
    displayName: medication.name?.trim() || 'Unknown',
    name: (medication.name ?? '').toLowerCase(),
    genericName: (medication.genericName ?? '').toLowerCase(),
  };
}

function matches(medication: NormalizedMedication, pattern: string): boolean {
  return (
    medication.name.includes(pattern) || medication.genericName.includes(pattern)
  );
}

/**
 * Offline safety check over static pattern tables. Used when the AI path is
 * unavailable; deterministic for a given input and `analyzedAt`.
 */
@Injectable()
export class RuleBasedAnalyzer {
  analyze(
    medications: readonly MedicationItem[],
    context: PatientContext,
    analyzedAt: Date = new Date(),
  ): AnalysisResult {
    const normalized = medications.map(normalize);

    const interactions = this.checkInteractions(normalized);
    const allergies = this.checkAllergies(normalized, context);
    const contraindications = this.checkContraindications(normalized, context);
    const monitoring = this.getMonitoring(normalized);

    return {
      interactions,
      allergies,
      contraindications,
      alternatives: [],
      monitoring,
      overallRisk: this.deriveOverallRisk(interactions, contraindications),
      summary: this.buildSummary(medications.length, interactions, allergies),
      source: 'fallback',
      timestamp: analyzedAt.toISOString(),
    };
  }

  /**
   * An entry fires only when at least two of its patterns are present
   * somewhere in the prescribed names or generic names.
   */
  private checkInteractions(
    medications: NormalizedMedication[],
  ): InteractionFinding[] {
    const findings: InteractionFinding[] = [];

    for (const pattern of INTERACTION_PATTERNS) {
      const matchedDrugs: string[] = [];
      for (const drugPattern of pattern.drugPatterns) {
        const medication = medications.find((med) => matches(med, drugPattern));
        if (medication) {
          matchedDrugs.push(medication.displayName);
        }
      }

      if (matchedDrugs.length >= 2) {
        findings.push({
          drugs: matchedDrugs,
          severity: pattern.severity,
          description: pattern.description,
          recommendation: pattern.recommendation,
        });
      }
    }

    return findings;
  }

  private checkAllergies(
    medications: NormalizedMedication[],
    context: PatientContext,
  ): AllergyFinding[] {
    const patientAllergies = (context.allergies ?? '').trim().toLowerCase();
    if (!patientAllergies || NO_ALLERGY_SENTINELS.includes(patientAllergies)) {
      return [];
    }

    const allergyList = splitDelimitedList(patientAllergies);
    const findings: AllergyFinding[] = [];

    for (const medication of medications) {
      for (const allergy of allergyList) {
        if (matches(medication, allergy)) {
          findings.push({
            drug: medication.displayName,
            allergy: toTitleCase(allergy),
            risk: 'Patient has documented allergy to this medication',
          });
        }
      }
    }

    return findings;
  }

  private checkContraindications(
    medications: NormalizedMedication[],
    context: PatientContext,
  ): ContraindicationFinding[] {
    const conditions = (context.medicalConditions ?? '').toLowerCase();
    if (!conditions.trim()) {
      return [];
    }

    const findings: ContraindicationFinding[] = [];

    for (const medication of medications) {
      for (const pattern of CONTRAINDICATION_PATTERNS) {
        if (
          matches(medication, pattern.drugPattern) &&
          conditions.includes(pattern.conditionPattern)
        ) {
          findings.push({
            drug: medication.displayName,
            condition: toTitleCase(pattern.conditionPattern),
            risk: pattern.risk,
          });
        }
      }
    }

    return findings;
  }

  private getMonitoring(medications: NormalizedMedication[]): MonitoringItem[] {
    const items: MonitoringItem[] = [];

    for (const medication of medications) {
      for (const pattern of MONITORING_PATTERNS) {
        if (matches(medication, pattern.drugPattern)) {
          items.push({
            parameter: pattern.parameter,
            frequency: pattern.frequency,
            reason: pattern.reason,
          });
        }
      }
    }

    return items;
  }

  private deriveOverallRisk(
    interactions: InteractionFinding[],
    contraindications: ContraindicationFinding[],
  ): RiskLevel {
    if (interactions.some((interaction) => interaction.severity === 'major')) {
      return 'high';
    }
    if (interactions.length > 0 || contraindications.length > 0) {
      return 'moderate';
    }
    return 'low';
  }

  private buildSummary(
    medicationCount: number,
    interactions: InteractionFinding[],
    allergies: AllergyFinding[],
  ): string {
    let summary = `Basic analysis completed for ${medicationCount} medication(s). `;
    if (interactions.length > 0) {
      summary += `Found ${interactions.length} potential interaction(s). `;
    }
    if (allergies.length > 0) {
      summary += `Found ${allergies.length} allergy concern(s). `;
    }
    summary += 'AI analysis was unavailable - this is a basic safety check only.';
    return summary;
  }
}
