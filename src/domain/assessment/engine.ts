import { randomUUID } from 'crypto';
import type { AnswerValue, AssessmentSession, ProfileHints, Question } from '../../shared/types';
import { OutOfOrderAnswerError, SessionAlreadyCompletedError } from '../../shared/errors';
import type { CatalogHandle } from '../catalog/catalog';
import { validateAnswerValue } from './answers';
import { cloneSession, isKnownToSession, nextPendingId } from './session';

// ============================================================================
// Insertion
// ============================================================================

/**
 * Append to the insertion queue unless the question is already scheduled or
 * answered. The queue is never reordered.
 */
function enqueue(session: AssessmentSession, questionId: string): boolean {
  if (isKnownToSession(session, questionId)) return false;
  session.insertionQueue.push(questionId);
  return true;
}

/**
 * Run symptom detection and conditional insertion for a freshly recorded
 * answer. Symptom follow-ups go first, then conditionals unlocked by the answer.
 */
function applyTriggers(
  catalog: CatalogHandle,
  session: AssessmentSession,
  question: Question,
  value: AnswerValue
): void {
  if (question.id === catalog.primarySymptomQuestionId && typeof value === 'string') {
    for (const match of catalog.matchSymptoms(value)) {
      if (!session.matchedSymptoms.includes(match.symptom)) {
        session.matchedSymptoms.push(match.symptom);
      }
      for (const followUp of catalog.followUpsFor(match.symptom)) {
        enqueue(session, followUp.id);
      }
    }
  }

  for (const conditional of catalog.conditionalsTriggeredBy(question.id, value)) {
    enqueue(session, conditional.id);
  }
}

function settleStatus(session: AssessmentSession, now: string): void {
  if (session.status === 'in_progress' && nextPendingId(session) === null) {
    session.status = 'completed';
    session.completedAt = now;
  }
}

// ============================================================================
// Session Lifecycle
// ============================================================================

/**
 * Start a session over the catalog's base questions.
 *
 * Non-compulsory base questions answered in `knownProfile` are recorded as
 * profile answers and never asked. Their triggers fire in base order once the
 * base sequence is fixed. Hints for compulsory or unknown questions are ignored.
 */
export function createSession(
  catalog: CatalogHandle,
  knownProfile: ProfileHints = {},
  now: Date = new Date()
): AssessmentSession {
  const timestamp = now.toISOString();
  const session: AssessmentSession = {
    id: randomUUID(),
    status: 'in_progress',
    baseSequence: [],
    insertionQueue: [],
    answers: [],
    cursor: 0,
    matchedSymptoms: [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };

  const prefilled: Array<{ question: Question; value: AnswerValue }> = [];

  for (const question of catalog.baseQuestions()) {
    if (question.isCompulsory || !Object.hasOwn(knownProfile, question.id)) {
      session.baseSequence.push(question.id);
      continue;
    }

    const value = validateAnswerValue(question, knownProfile[question.id]);
    session.answers.push({
      questionId: question.id,
      value,
      source: 'profile',
      answeredAt: timestamp,
    });
    prefilled.push({ question, value });
  }

  for (const { question, value } of prefilled) {
    applyTriggers(catalog, session, question, value);
  }

  settleStatus(session, timestamp);
  return session;
}

/**
 * Record the answer to the pending question and return the advanced session.
 *
 * The input session is left untouched; on any failure nothing is applied.
 */
export function recordAnswer(
  catalog: CatalogHandle,
  session: AssessmentSession,
  questionId: string,
  value: unknown,
  now: Date = new Date()
): AssessmentSession {
  if (session.status === 'completed') {
    throw new SessionAlreadyCompletedError(session.id);
  }

  const pendingId = nextPendingId(session);
  if (pendingId !== questionId) {
    throw new OutOfOrderAnswerError(questionId, pendingId);
  }

  const question = catalog.requireQuestion(questionId);
  const accepted = validateAnswerValue(question, value);

  const timestamp = now.toISOString();
  const next = cloneSession(session);

  next.answers.push({
    questionId,
    value: accepted,
    source: 'patient',
    answeredAt: timestamp,
  });
  next.cursor += 1;
  next.updatedAt = timestamp;

  applyTriggers(catalog, next, question, accepted);
  settleStatus(next, timestamp);

  return next;
}
