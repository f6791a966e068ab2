import type {
  AnswerRecord,
  AssessmentSession,
  ChatMessage,
  ChatResponder,
  ProfileHints,
  QuestionView,
  ReportGenerator,
  ReportResult,
  SessionProgress,
  SessionStatus,
} from '../../shared/types';
import {
  InvalidChatHistoryError,
  ReportNotGeneratedError,
  SessionNotCompletedError,
  SessionNotFoundError,
} from '../../shared/errors';
import { KeyedMutex } from '../../shared/keyed-mutex';
import { logExecution, logger as rootLogger } from '../../infra/logging/logger';
import type { ContextLogger } from '../../infra/logging/logger';
import type { SessionStore } from '../../infra/store/session-store';
import type { CatalogHandle } from '../catalog/catalog';
import { toQuestionView } from '../catalog/catalog';
import { buildReport, validateReportResponse } from '../report/assembler';
import { buildChatMessages, buildChatSystemPrompt, patientName, welcomeInstruction } from '../chat/prompt';
import { createSession, recordAnswer } from './engine';
import { nextPending, sessionProgress } from './session';

// ============================================================================
// Results
// ============================================================================

export interface StartResult {
  sessionId: string;
  status: SessionStatus;
  firstQuestion: QuestionView | null;
  totalEffectiveQuestionCountEstimate: number;
}

export type AnswerResult =
  | { status: 'in_progress'; nextQuestion: QuestionView; progress: SessionProgress }
  | { status: 'completed'; progress: SessionProgress };

export interface SessionSnapshot {
  sessionId: string;
  status: SessionStatus;
  nextQuestion: QuestionView | null;
  progress: SessionProgress;
  matchedSymptoms: string[];
  answers: AnswerRecord[];
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  report?: ReportResult;
}

export interface ChatReply {
  sessionId: string;
  message: string;
}

// ============================================================================
// Service
// ============================================================================

/**
 * Boundary operations over assessment sessions. Calls for the same session
 * are serialized; the store only ever sees fully-applied sessions.
 */
export class AssessmentService {
  private locks = new KeyedMutex();

  constructor(
    private readonly catalog: CatalogHandle,
    private readonly store: SessionStore,
    private readonly assistant: ReportGenerator & ChatResponder,
    private readonly log: ContextLogger = rootLogger
  ) {}

  async start(profile: ProfileHints = {}, log: ContextLogger = this.log): Promise<StartResult> {
    return logExecution<StartResult>('start_assessment', async () => {
      const session = createSession(this.catalog, profile);
      await this.store.put(session);

      const first = nextPending(this.catalog, session);
      log.info(
        {
          sessionId: session.id,
          prefilled: session.answers.length,
          matchedSymptoms: session.matchedSymptoms,
        },
        'Assessment started'
      );

      return {
        sessionId: session.id,
        status: session.status,
        firstQuestion: first ? toQuestionView(first) : null,
        totalEffectiveQuestionCountEstimate: sessionProgress(session).total,
      };
    }, log);
  }

  async answer(
    sessionId: string,
    questionId: string,
    value: unknown,
    log: ContextLogger = this.log
  ): Promise<AnswerResult> {
    return this.locks.runExclusive(sessionId, () =>
      logExecution<AnswerResult>('record_answer', async () => {
        const session = await this.load(sessionId);
        const next = recordAnswer(this.catalog, session, questionId, value);
        await this.store.put(next);

        const inserted = next.insertionQueue.length - session.insertionQueue.length;
        if (inserted > 0) {
          log.info(
            { sessionId, questionId, inserted, matchedSymptoms: next.matchedSymptoms },
            'Follow-up questions inserted'
          );
        }

        const progress = sessionProgress(next);
        const pending = nextPending(this.catalog, next);
        if (next.status === 'completed' || !pending) {
          log.info({ sessionId, answered: progress.answered }, 'Assessment completed');
          return { status: 'completed', progress };
        }
        return { status: 'in_progress', nextQuestion: toQuestionView(pending), progress };
      }, log, { sessionId, questionId })
    );
  }

  /**
   * Generate the report for a completed session. The first successful result
   * is kept on the session and returned by every later call.
   */
  async report(sessionId: string, log: ContextLogger = this.log): Promise<ReportResult> {
    return this.locks.runExclusive(sessionId, () =>
      logExecution<ReportResult>('generate_report', async () => {
        const session = await this.load(sessionId);
        if (session.report) {
          log.debug({ sessionId }, 'Returning stored report');
          return session.report;
        }

        const request = buildReport(this.catalog, session);
        const raw = await this.assistant.generate(request);
        const report = validateReportResponse(raw, request);

        const updated: AssessmentSession = {
          ...session,
          report,
          updatedAt: report.generated_at,
        };
        await this.store.put(updated);

        log.info(
          {
            sessionId,
            reportId: report.report_id,
            urgencyLevel: report.urgency_level,
            causes: report.possible_causes.length,
          },
          'Report generated'
        );
        return report;
      }, log, { sessionId })
    );
  }

  /**
   * Open the follow-up chat on a reported session with a welcome message
   * that greets the patient by name.
   */
  async startChat(sessionId: string, log: ContextLogger = this.log): Promise<ChatReply> {
    return logExecution<ChatReply>('start_chat', async () => {
      const report = await this.loadReport(sessionId);
      const name = patientName(report.patient_info);

      const message = await this.assistant.respond({
        sessionId,
        system: buildChatSystemPrompt(report),
        messages: [{ role: 'user', content: welcomeInstruction(name) }],
      });

      log.info({ sessionId }, 'Follow-up chat started');
      return { sessionId, message };
    }, log, { sessionId });
  }

  /**
   * Answer the last user message of a follow-up chat. The caller keeps the
   * history; profile and report context are reloaded from the session each time.
   */
  async chat(sessionId: string, history: ChatMessage[], log: ContextLogger = this.log): Promise<ChatReply> {
    const last = history[history.length - 1];
    if (!last) {
      throw new InvalidChatHistoryError('history cannot be empty');
    }
    if (last.role !== 'user') {
      throw new InvalidChatHistoryError('last message must be from the user');
    }

    return logExecution<ChatReply>('chat_message', async () => {
      const report = await this.loadReport(sessionId);

      const message = await this.assistant.respond({
        sessionId,
        system: buildChatSystemPrompt(report),
        messages: buildChatMessages(history, patientName(report.patient_info)),
      });

      log.debug({ sessionId, turns: history.length }, 'Follow-up chat answered');
      return { sessionId, message };
    }, log, { sessionId, turns: history.length });
  }

  async get(sessionId: string): Promise<SessionSnapshot> {
    const session = await this.load(sessionId);
    const pending = nextPending(this.catalog, session);

    return {
      sessionId: session.id,
      status: session.status,
      nextQuestion: pending ? toQuestionView(pending) : null,
      progress: sessionProgress(session),
      matchedSymptoms: session.matchedSymptoms,
      answers: session.answers,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
      ...(session.completedAt ? { completedAt: session.completedAt } : {}),
      ...(session.report ? { report: session.report } : {}),
    };
  }

  /** Hard delete. */
  async end(sessionId: string, log: ContextLogger = this.log): Promise<void> {
    await this.locks.runExclusive(sessionId, async () => {
      const removed = await this.store.delete(sessionId);
      if (!removed) {
        throw new SessionNotFoundError(sessionId);
      }
      log.info({ sessionId }, 'Assessment ended');
    });
  }

  private async loadReport(sessionId: string): Promise<ReportResult> {
    const session = await this.load(sessionId);
    if (session.status !== 'completed') {
      throw new SessionNotCompletedError(sessionId);
    }
    if (!session.report) {
      throw new ReportNotGeneratedError(sessionId);
    }
    return session.report;
  }

  private async load(sessionId: string): Promise<AssessmentSession> {
    const session = await this.store.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }
}
