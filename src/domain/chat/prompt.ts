import type { ChatMessage, PatientInfo, ReportResult } from '../../shared/types';

export const ASSISTANT_NAME = 'Remy';

const ASSISTANT_RULES = `You are ${ASSISTANT_NAME}, a friendly and knowledgeable medical triage assistant.

Rules you MUST follow:
- Never diagnose definitively. You are not a doctor.
- Respect the urgency level from the patient's report.
- Be calm, clear and structured in your responses.
- Follow medical safety boundaries at all times.
- Always recommend consulting a doctor for serious concerns.
- Be empathetic, warm and supportive.
- Keep responses concise but helpful.
- If the patient asks something outside your scope, gently redirect.`;

export function patientName(info: PatientInfo): string {
  const name = info.name?.trim();
  return name ? name : 'there';
}

function describeProfile(info: PatientInfo): string | null {
  const lines = Object.entries(info)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([field, value]) => `- ${field}: ${value}`);
  return lines.length > 0 ? ['PATIENT PROFILE:', ...lines].join('\n') : null;
}

function describeReport(report: ReportResult): string {
  const lines = [
    'CURRENT ASSESSMENT REPORT:',
    'This conversation follows up on the assessment report below. The patient may ask for',
    'clarification, question its accuracy or want something explained. Treat the report as',
    'the main topic unless the patient changes the subject.',
    `Assessment topic: ${report.assessment_topic}`,
    `Urgency level: ${report.urgency_level}`,
  ];

  if (report.summary.length > 0) {
    lines.push(`Summary: ${report.summary.join(' ')}`);
  }

  lines.push('Possible causes:');
  for (const cause of report.possible_causes) {
    const percent = Math.round(cause.probability * 100);
    const short = cause.short_description ? `: ${cause.short_description}` : '';
    lines.push(`  - ${cause.title} (${cause.severity}, ${percent}% probability)${short}`);

    const steps = cause.detail?.what_you_can_do_now ?? [];
    if (steps.length > 0) {
      lines.push(`    What the patient can do: ${steps.join('; ')}`);
    }
    if (cause.detail?.warning) {
      lines.push(`    Warning: ${cause.detail.warning}`);
    }
  }

  if (report.advice.length > 0) {
    lines.push(`Advice: ${report.advice.join('; ')}`);
  }

  return lines.join('\n');
}

/**
 * System prompt for follow-up chat: assistant rules, then the patient profile
 * and the stored report. Rebuilt for every call.
 */
export function buildChatSystemPrompt(report: ReportResult): string {
  const profile = describeProfile(report.patient_info);
  return [ASSISTANT_RULES, ...(profile ? [profile] : []), describeReport(report)].join('\n\n');
}

export function welcomeInstruction(name: string): string {
  return (
    `Start the conversation. Greet the patient by their name (${name}). ` +
    `Introduce yourself as ${ASSISTANT_NAME}. Mention their recent assessment report briefly ` +
    'and ask how you can help them understand or follow up on it. ' +
    'Keep it warm and concise, two or three sentences at most.'
  );
}

/**
 * The model expects the conversation to open with a user turn. A history that
 * starts with the welcome message gets the instruction that produced it.
 */
export function buildChatMessages(history: ChatMessage[], name: string): ChatMessage[] {
  if (history[0]?.role === 'assistant') {
    return [{ role: 'user', content: welcomeInstruction(name) }, ...history];
  }
  return [...history];
}
