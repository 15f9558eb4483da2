import type { PipelineStage, StageEvent } from '../../shared/types';
import { errorMessage, type Logger } from '../obs/logger';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

const nowIso = () => new Date().toISOString();

/**
 * Per-date stage reporter. Every event is logged at debug level and forwarded
 * to `send` when a listener is attached. A throwing listener is logged and
 * never interrupts the run.
 */
export const makeStageEmitter = (runId: string, date: string, logger: Logger, send?: StageEventSender) => {
  const dispatch = <T>(event: StageEvent<T>) => {
    logger.debug('Pipeline stage', {
      runId: event.runId,
      date: event.date,
      stage: event.stage,
      status: event.status,
      message: event.message,
    });
    if (!send) {
      return;
    }
    try {
      send(event);
    } catch (error) {
      logger.error('Stage listener failed', {
        runId: event.runId,
        stage: event.stage,
        status: event.status,
        error: errorMessage(error),
      });
    }
  };

  return {
    start: <T>(stage: PipelineStage, payload?: { message?: string; data?: T }) => {
      dispatch({ runId, date, stage, status: 'start', message: payload?.message, data: payload?.data, ts: nowIso() });
    },
    progress: <T>(stage: PipelineStage, payload?: { message?: string; data?: T }) => {
      dispatch({ runId, date, stage, status: 'progress', message: payload?.message, data: payload?.data, ts: nowIso() });
    },
    success: <T>(stage: PipelineStage, payload?: { message?: string; data?: T }) => {
      dispatch({ runId, date, stage, status: 'success', message: payload?.message, data: payload?.data, ts: nowIso() });
    },
    failure: (stage: PipelineStage, error: unknown, options?: { data?: unknown }) => {
      const message = errorMessage(error);
      dispatch({
        runId,
        date,
        stage,
        status: 'failure',
        message,
        data: options?.data ?? { error: message },
        ts: nowIso(),
      });
    },
  };
};

export type StageEmitter = ReturnType<typeof makeStageEmitter>;
