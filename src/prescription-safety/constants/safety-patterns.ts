import { InteractionSeverity } from '../types/analysis.types';

// Illustrative patterns for the offline check, not a drug reference.
// All patterns are lowercase substrings matched against medication and
// generic names.

export interface InteractionPattern {
  drugPatterns: readonly string[];
  severity: InteractionSeverity;
  description: string;
  recommendation: string;
}

export interface ContraindicationPattern {
  drugPattern: string;
  conditionPattern: string;
  risk: string;
}

export interface MonitoringPattern {
  drugPattern: string;
  parameter: string;
  frequency: string;
  reason: string;
}

export const INTERACTION_PATTERNS: readonly InteractionPattern[] = [
  {
    drugPatterns: ['warfarin', 'aspirin'],
    severity: 'major',
    description: 'Increased bleeding risk',
    recommendation: 'Monitor INR closely, consider alternative',
  },
  {
    drugPatterns: ['metformin', 'contrast'],
    severity: 'major',
    description: 'Risk of lactic acidosis',
    recommendation: 'Hold metformin before and after contrast procedures',
  },
  {
    drugPatterns: ['ace inhibitor', 'potassium'],
    severity: 'moderate',
    description: 'Risk of hyperkalemia',
    recommendation: 'Monitor serum potassium levels',
  },
  {
    drugPatterns: ['nsaid', 'ace inhibitor'],
    severity: 'moderate',
    description: 'Reduced antihypertensive effect, kidney function risk',
    recommendation: 'Monitor blood pressure and kidney function',
  },
];

export const CONTRAINDICATION_PATTERNS: readonly ContraindicationPattern[] = [
  {
    drugPattern: 'nsaid',
    conditionPattern: 'kidney disease',
    risk: 'NSAIDs can worsen kidney function',
  },
  {
    drugPattern: 'metformin',
    conditionPattern: 'kidney disease',
    risk: 'Risk of lactic acidosis with reduced kidney function',
  },
  {
    drugPattern: 'beta blocker',
    conditionPattern: 'asthma',
    risk: 'Beta blockers can trigger bronchospasm in asthma patients',
  },
];

export const MONITORING_PATTERNS: readonly MonitoringPattern[] = [
  {
    drugPattern: 'warfarin',
    parameter: 'INR',
    frequency: 'Weekly initially, then monthly when stable',
    reason: 'Monitor anticoagulation effect',
  },
  {
    drugPattern: 'ace inhibitor',
    parameter: 'Kidney function and potassium',
    frequency: '2-4 weeks after initiation, then every 6 months',
    reason: 'Monitor for kidney effects and hyperkalemia',
  },
  {
    drugPattern: 'statin',
    parameter: 'Liver function',
    frequency: '6-12 weeks after initiation, then annually',
    reason: 'Monitor for liver toxicity',
  },
  {
    drugPattern: 'metformin',
    parameter: 'Kidney function and vitamin B12',
    frequency: 'Every 6-12 months',
    reason: 'Monitor for kidney effects and B12 deficiency',
  },
];

export const NO_ALLERGY_SENTINELS: readonly string[] = [
  'none',
  'none known',
  'nka',
];
