import cron, {ScheduledTask} from 'node-cron';
import {QuizSessionManager} from '../services/quizSessionManager';
import {logger} from '../utils/logger';

/**
 * Drops expired sessions and returns how many were dropped.
 */
export function sweepExpiredSessions(sessions: QuizSessionManager, now: Date = new Date()): number {
  const expired = sessions.sweepExpired(now);
  if (expired.length > 0) {
    logger.debug(`Expired ${expired.length} quiz session(s): ${expired.map(s => s.userId).join(', ')}`);
  }
  return expired.length;
}

export function startSessionSweeper(sessions: QuizSessionManager, expression: string): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid cron expression for the session sweeper: "${expression}"`);
  }

  const task = cron.schedule(expression, () => {
    sweepExpiredSessions(sessions);
  });

  logger.info(`Session sweeper scheduled (${expression})`);
  return task;
}
