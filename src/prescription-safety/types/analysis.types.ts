/**
 * Type definitions for prescription safety analysis
 */

export interface MedicationItem {
  name: string;
  genericName?: string;
  dosage?: string;
  frequency?: string;
}

export type PatientAge = number | 'unknown';

export interface PatientContext {
  age?: PatientAge;
  gender?: string;
  // Comma or semicolon delimited, may be "None known"
  allergies?: string;
  medicalConditions?: string;
}

export const INTERACTION_SEVERITIES = ['major', 'moderate', 'minor'] as const;
export type InteractionSeverity = (typeof INTERACTION_SEVERITIES)[number];

export const RISK_LEVELS = ['low', 'moderate', 'high'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export type AnalysisSource = 'ai' | 'fallback' | 'system' | 'error';

/**
 * `heuristic` means the model answered with free text that had to be mined
 * for keywords instead of the requested JSON document.
 */
export type InterpretationMode = 'structured' | 'heuristic';

export interface InteractionFinding {
  drugs: string[];
  severity: InteractionSeverity;
  description: string;
  recommendation: string;
}

export interface AllergyFinding {
  drug: string;
  allergy: string;
  risk: string;
}

export interface ContraindicationFinding {
  drug: string;
  condition: string;
  risk: string;
}

export interface AlternativeSuggestion {
  insteadOf: string;
  suggested: string;
  reason: string;
}

export interface MonitoringItem {
  parameter: string;
  frequency: string;
  reason: string;
}

export interface SafetyFindings {
  interactions: InteractionFinding[];
  allergies: AllergyFinding[];
  contraindications: ContraindicationFinding[];
  alternatives: AlternativeSuggestion[];
  monitoring: MonitoringItem[];
}

export interface AnalysisResult extends SafetyFindings {
  overallRisk: RiskLevel;
  summary: string;
  source: AnalysisSource;
  timestamp: string;
  interpretation?: InterpretationMode;
  error?: string;
}

export type AnalysisProgressEvent =
  | { type: 'attempt'; attempt: number; maxAttempts: number }
  | { type: 'retry'; attempt: number; maxAttempts: number; reason: string }
  | { type: 'fallback'; reason: string }
  | { type: 'completed'; source: AnalysisSource };

export interface AnalyzeSafetyOptions {
  signal?: AbortSignal;
  onProgress?: (event: AnalysisProgressEvent) => void;
}

export interface AnalysisServiceStatus {
  enabled: boolean;
  apiConfigured: boolean;
  fallbackEnabled: boolean;
  model: string;
  maxRetries: number;
}

export function emptyFindings(): SafetyFindings {
  return {
    interactions: [],
    allergies: [],
    contraindications: [],
    alternatives: [],
    monitoring: [],
  };
}
