import { MedicationItem, PatientContext } from '../types/analysis.types';

export const ANALYSIS_SYSTEM_PROMPT =
  'You are a clinical pharmacist AI assistant specializing in drug interaction analysis. Always respond with valid JSON format.';

const RESPONSE_SCHEMA = `{
    "interactions": [
        {
            "drugs": ["Drug A", "Drug B"],
            "severity": "major|moderate|minor",
            "description": "Description of the interaction",
            "recommendation": "Clinical recommendation"
        }
    ],
    "allergies": [
        {
            "drug": "Drug name",
            "allergy": "Known allergy",
            "risk": "Risk assessment"
        }
    ],
    "contraindications": [
        {
            "drug": "Drug name",
            "condition": "Medical condition",
            "risk": "Risk level and explanation"
        }
    ],
    "alternatives": [
        {
            "instead_of": "Current drug",
            "suggested": "Alternative drug",
            "reason": "Reason for alternative"
        }
    ],
    "monitoring": [
        {
            "parameter": "What to monitor",
            "frequency": "How often",
            "reason": "Why monitoring is needed"
        }
    ],
    "overall_risk": "low|moderate|high",
    "summary": "Brief overall assessment"
}`;

function orDefault(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

export function formatMedicationLine(medication: MedicationItem): string {
  let line = `- ${orDefault(medication.name, 'Unknown')} (${orDefault(medication.genericName, 'N/A')})`;
  if (medication.dosage?.trim()) {
    line += ` - ${medication.dosage.trim()}`;
  }
  if (medication.frequency?.trim()) {
    line += ` ${medication.frequency.trim()}`;
  }
  return line;
}

function formatAge(age: PatientContext['age']): string {
  return typeof age === 'number' ? String(age) : 'Unknown';
}

/**
 * Render the analysis request sent as the user message. Output depends only
 * on the arguments.
 */
export function buildAnalysisPrompt(
  medications: readonly MedicationItem[],
  context: PatientContext,
): string {
  const medicationsText = medications.map(formatMedicationLine).join('\n');

  return `
You are a clinical pharmacist AI assistant. Analyze the following prescription for potential drug interactions, contraindications, and safety concerns.

PATIENT INFORMATION:
- Age: ${formatAge(context.age)}
- Gender: ${orDefault(context.gender, 'Unknown')}
- Known Allergies: ${orDefault(context.allergies, 'None known')}
- Medical Conditions: ${orDefault(context.medicalConditions, 'None reported')}

PRESCRIBED MEDICATIONS:
${medicationsText}

Please provide a comprehensive analysis in the following JSON format:

${RESPONSE_SCHEMA}

Focus on clinically significant interactions and provide actionable recommendations. If no significant issues are found, indicate that in your response.
`;
}
