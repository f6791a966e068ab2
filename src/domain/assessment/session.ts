import type {
  AnswerValue,
  AssessmentSession,
  Question,
  SessionProgress,
} from '../../shared/types';
import type { CatalogHandle } from '../catalog/catalog';

/**
 * Base sequence followed by the insertion queue, in arrival order.
 * Questions pre-filled from the profile are not part of it.
 */
export function effectiveSequence(session: AssessmentSession): string[] {
  return [...session.baseSequence, ...session.insertionQueue];
}

export function nextPendingId(session: AssessmentSession): string | null {
  return effectiveSequence(session)[session.cursor] ?? null;
}

export function nextPending(catalog: CatalogHandle, session: AssessmentSession): Question | null {
  const id = nextPendingId(session);
  return id === null ? null : catalog.requireQuestion(id);
}

export function answerFor(session: AssessmentSession, questionId: string): AnswerValue | undefined {
  return session.answers.find((a) => a.questionId === questionId)?.value;
}

/**
 * True once the id is scheduled or already answered, i.e. inserting it again
 * would ask the same question twice.
 */
export function isKnownToSession(session: AssessmentSession, questionId: string): boolean {
  return (
    session.baseSequence.includes(questionId) ||
    session.insertionQueue.includes(questionId) ||
    session.answers.some((a) => a.questionId === questionId)
  );
}

export function sessionProgress(session: AssessmentSession): SessionProgress {
  return {
    answered: session.cursor,
    total: session.baseSequence.length + session.insertionQueue.length,
  };
}

export function cloneSession(session: AssessmentSession): AssessmentSession {
  return structuredClone(session);
}
