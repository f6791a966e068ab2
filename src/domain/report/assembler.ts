import { randomUUID } from 'crypto';
import { z } from 'zod';
import { SEVERITIES, URGENCY_LEVELS } from '../../shared/types';
import type {
  AnswerValue,
  AssessmentSession,
  GuidanceBundle,
  NarrativeEntry,
  PatientInfo,
  ReportRequest,
  ReportResult,
  UrgencyLevel,
} from '../../shared/types';
import { MalformedReportResponseError, SessionNotCompletedError } from '../../shared/errors';
import { findKeywords } from '../../shared/matching';
import { isNoneLike, normalizeText } from '../../shared/validation';
import type { CatalogHandle } from '../catalog/catalog';
import { renderAnswer } from '../assessment/answers';
import { answerFor } from '../assessment/session';

export const DEFAULT_ASSESSMENT_TOPIC = 'general_health';
export const DEFAULT_SUMMARY = 'Assessment completed based on provided information.';
export const DEFAULT_ADVICE = 'Consult with a healthcare provider for personalized advice.';

// ============================================================================
// Patient Info
// ============================================================================

/**
 * Age from a stored answer. Range values such as "26_35" give the midpoint,
 * "65_plus" gives 65, plain numbers are truncated.
 */
export function extractAge(value: AnswerValue): number | undefined {
  if (typeof value === 'number') {
    return Math.trunc(value);
  }
  if (Array.isArray(value)) {
    return undefined;
  }

  const numbers = value.match(/\d+/g)?.map(Number) ?? [];
  if (numbers.length >= 2) {
    return Math.floor((numbers[0] + numbers[1]) / 2);
  }
  return numbers.length === 1 ? numbers[0] : undefined;
}

function buildPatientInfo(catalog: CatalogHandle, session: AssessmentSession): PatientInfo {
  const info: PatientInfo = {};

  for (const record of session.answers) {
    const question = catalog.requireQuestion(record.questionId);
    if (!question.patientField) continue;

    if (question.patientField === 'age') {
      const age = extractAge(record.value);
      if (age !== undefined) info.age = age;
      continue;
    }

    info[question.patientField] = Array.isArray(record.value)
      ? record.value.join(', ')
      : record.value;
  }

  return info;
}

// ============================================================================
// Medical History
// ============================================================================

export function parseMedicalHistory(text: string): string[] {
  if (isNoneLike(text)) return [];

  return text
    .split(/,|;|&|\band\b/i)
    .map((item) => item.trim())
    .filter((item) => item.length > 0 && !isNoneLike(item));
}

// ============================================================================
// Guidance
// ============================================================================

function mostUrgent(levels: UrgencyLevel[]): UrgencyLevel {
  return levels.reduce<UrgencyLevel>(
    (worst, level) =>
      URGENCY_LEVELS.indexOf(level) > URGENCY_LEVELS.indexOf(worst) ? level : worst,
    'green_home_care'
  );
}

function pushUnique(target: string[], items: Iterable<string>): void {
  for (const item of items) {
    if (!target.includes(item)) target.push(item);
  }
}

export function buildGuidanceBundle(catalog: CatalogHandle, symptomNames: string[]): GuidanceBundle {
  const bundle: GuidanceBundle = {
    matchedSymptoms: [],
    labels: [],
    defaultUrgency: 'green_home_care',
    redFlags: [],
    analysisHints: [],
    suggestedAdvice: [],
  };
  const urgencies: UrgencyLevel[] = [];

  for (const name of symptomNames) {
    const symptom = catalog.symptom(name);
    if (!symptom) continue;

    bundle.matchedSymptoms.push(symptom.name);
    bundle.labels.push(symptom.label);
    urgencies.push(symptom.defaultUrgency);
    pushUnique(bundle.redFlags, symptom.redFlags);
    if (symptom.analysisHints) pushUnique(bundle.analysisHints, [symptom.analysisHints]);
    if (symptom.suggestedAdvice) pushUnique(bundle.suggestedAdvice, [symptom.suggestedAdvice]);
  }

  bundle.defaultUrgency = mostUrgent(urgencies);
  return bundle;
}

// ============================================================================
// Report Request
// ============================================================================

/**
 * Collect a completed session into the payload handed to the report generator.
 */
export function buildReport(catalog: CatalogHandle, session: AssessmentSession): ReportRequest {
  if (session.status !== 'completed') {
    throw new SessionNotCompletedError(session.id);
  }

  const narrative: NarrativeEntry[] = [];
  const freeText: string[] = [];

  for (const record of session.answers) {
    const question = catalog.requireQuestion(record.questionId);

    if (question.type === 'free_text' && typeof record.value === 'string') {
      freeText.push(record.value);
    }
    if (question.patientField) continue;

    narrative.push({
      questionId: question.id,
      question: question.prompt,
      answer: renderAnswer(question, record.value),
      symptomTags: question.symptomTags ? [...question.symptomTags] : [],
    });
  }

  const primary = answerFor(session, catalog.primarySymptomQuestionId);
  const assessmentTopic =
    typeof primary === 'string' && normalizeText(primary)
      ? normalizeText(primary)
      : DEFAULT_ASSESSMENT_TOPIC;

  const history =
    catalog.medicalHistoryQuestionId !== undefined
      ? answerFor(session, catalog.medicalHistoryQuestionId)
      : undefined;

  return {
    sessionId: session.id,
    assessmentTopic,
    patientInfo: buildPatientInfo(catalog, session),
    medicalHistory: typeof history === 'string' ? parseMedicalHistory(history) : [],
    narrative,
    guidance: buildGuidanceBundle(catalog, session.matchedSymptoms),
    emergencyKeywordsDetected: findKeywords(freeText, [...catalog.emergencyKeywords]),
    disclaimer: catalog.disclaimer,
  };
}

// ============================================================================
// Response Validation
// ============================================================================

const severitySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(SEVERITIES)
);

const possibleCauseSchema = z.object({
  id: z.string().optional(),
  title: z.string().trim().min(1),
  short_description: z.string().optional(),
  subtitle: z.string().optional(),
  severity: severitySchema,
  probability: z.number().min(0).max(1),
  detail: z
    .object({
      about_this: z.array(z.string()).optional(),
      how_common: z
        .object({
          percentage: z.number().optional(),
          description: z.string().optional(),
        })
        .optional(),
      what_you_can_do_now: z.array(z.string()).optional(),
      warning: z.string().optional(),
    })
    .optional(),
});

const textList = z.union([z.string(), z.array(z.string())]).transform((value) =>
  (Array.isArray(value) ? value : [value]).map((s) => s.trim()).filter((s) => s.length > 0)
);

const reportResponseSchema = z.object({
  assessment_topic: z.string().optional(),
  summary: textList.optional(),
  possible_causes: z.array(possibleCauseSchema).min(1),
  advice: textList.optional(),
  urgency_level: z.enum(URGENCY_LEVELS),
});

/**
 * Check the generator's payload and normalize it into a stored report.
 */
export function validateReportResponse(
  raw: unknown,
  request: ReportRequest,
  now: Date = new Date()
): ReportResult {
  const result = reportResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedReportResponseError(
      result.error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
      })
    );
  }

  const body = result.data;
  const summary = body.summary && body.summary.length > 0 ? body.summary : [DEFAULT_SUMMARY];
  const advice = body.advice && body.advice.length > 0 ? body.advice : [DEFAULT_ADVICE];

  return {
    report_id: randomUUID(),
    session_id: request.sessionId,
    generated_at: now.toISOString(),
    assessment_topic: body.assessment_topic?.trim() || request.assessmentTopic,
    patient_info: { ...request.patientInfo },
    summary,
    possible_causes: body.possible_causes,
    advice,
    urgency_level: body.urgency_level,
  };
}
