import type { ReportRequest } from '../../shared/types';
import { URGENCY_LEVELS, SEVERITIES } from '../../shared/types';

export interface ReportPrompt {
  system: string;
  prompt: string;
}

const SYSTEM_PROMPT = `You are a clinical intake assistant that prepares a preliminary assessment for a patient.
You do not diagnose. You summarize what the patient reported and list possible causes with their likelihood.
Respond with a single JSON object and nothing else: no prose, no markdown fences.`;

const RESPONSE_FORMAT = `{
  "assessment_topic": "short topic of the assessment",
  "summary": ["Key observation 1", "Key observation 2"],
  "possible_causes": [
    {
      "id": "condition_name_lowercase",
      "title": "Condition Name",
      "short_description": "One-line description for a list view",
      "subtitle": "Optional context or common association",
      "severity": "${SEVERITIES.join('|')}",
      "probability": 0.0,
      "detail": {
        "about_this": ["Explanation point"],
        "how_common": { "percentage": 60, "description": "6 out of 10 people with similar symptoms had this" },
        "what_you_can_do_now": ["Actionable step"],
        "warning": "Optional warning if there are concerning factors"
      }
    }
  ],
  "advice": ["Actionable recommendation"],
  "urgency_level": "${[...URGENCY_LEVELS].reverse().join('|')}"
}`;

function bulletList(items: string[], empty: string): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : `- ${empty}`;
}

function describePatient(request: ReportRequest): string {
  const entries = Object.entries(request.patientInfo).filter(
    (entry): entry is [string, string | number] => entry[1] !== undefined
  );
  return bulletList(
    entries.map(([field, value]) => `${field}: ${value}`),
    'not provided'
  );
}

/**
 * Render a report request as the messages sent to the model.
 */
export function buildReportPrompt(request: ReportRequest): ReportPrompt {
  const { guidance } = request;

  const sections = [
    `ASSESSMENT TOPIC: ${request.assessmentTopic}`,
    `PATIENT:\n${describePatient(request)}`,
    `MEDICAL HISTORY:\n${bulletList(request.medicalHistory, 'none reported')}`,
    `INTAKE ANSWERS:\n${bulletList(
      request.narrative.map((entry) => `${entry.question} ${entry.answer}`),
      'none'
    )}`,
    `MATCHED SYMPTOMS: ${guidance.labels.length > 0 ? guidance.labels.join(', ') : 'none'}`,
    `CLINICAL GUIDANCE:
Default urgency for the matched symptoms: ${guidance.defaultUrgency}
Red flags to check against the answers:
${bulletList(guidance.redFlags, 'none listed')}
Analysis hints:
${bulletList(guidance.analysisHints, 'none')}
Suggested advice:
${bulletList(guidance.suggestedAdvice, 'none')}`,
  ];

  if (request.emergencyKeywordsDetected.length > 0) {
    sections.push(
      `EMERGENCY KEYWORDS DETECTED: ${request.emergencyKeywordsDetected.join(', ')}\n` +
        'Use red_emergency unless the answers clearly rule out an emergency.'
    );
  }

  sections.push(`Return JSON in exactly this format:\n${RESPONSE_FORMAT}`);
  sections.push(
    [
      'Rules:',
      '- probability is a number between 0 and 1; probabilities should sum to about 1',
      '- urgency_level must agree with the clinical guidance above',
      '- advice must be specific and actionable',
    ].join('\n')
  );

  return {
    system: SYSTEM_PROMPT,
    prompt: sections.join('\n\n'),
  };
}
