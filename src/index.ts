import {loadConfig} from './config';
import {createBot, BOT_COMMANDS} from './lib/bot';
import {startSessionSweeper} from './scheduler/sessionSweeper';
import {PollImportService} from './services/pollImportService';
import {QuestionService} from './services/questionService';
import {JsonQuestionStore} from './services/questionStore';
import {QuizEngine} from './services/quizEngine';
import {QuizSessionManager} from './services/quizSessionManager';
import {StatsService} from './services/statsService';
import {JsonUserStore} from './services/userStore';
import {createStatusApp, startStatusServer} from './web/statusServer';
import {logger} from './utils/logger';

async function start() {
  const config = loadConfig();

  const questionStore = new JsonQuestionStore(config.questionsFile);
  await questionStore.init();
  const userStore = new JsonUserStore(config.usersFile);

  const sessions = new QuizSessionManager(
    config.sessionTimeoutSeconds === null ? null : config.sessionTimeoutSeconds * 1000
  );
  const engine = new QuizEngine({questions: questionStore, users: userStore, sessions});
  const questions = new QuestionService(questionStore);
  const stats = new StatsService(questionStore, userStore);
  const pollImporter = new PollImportService();

  const bot = createBot(config.botToken, {engine, questions, pollImporter});

  const server = await startStatusServer(
    createStatusApp({
      stats,
      activeSessions: () => engine.activeSessionCount(),
      isBotRunning: () => bot.isRunning(),
    }),
    config.port,
    config.host
  );

  const sweeper = config.sessionTimeoutSeconds === null
    ? null
    : startSessionSweeper(sessions, config.sessionSweepCron);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`${signal} received, stopping the bot...`);

    sweeper?.stop();
    try {
      await bot.stop();
    } catch (error) {
      logger.error('Error while stopping the bot', error);
    }
    server.close();
    sessions.clear();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  await bot.api.setMyCommands(BOT_COMMANDS).catch((error: unknown) => {
    logger.warn('Could not register the command list with Telegram', error);
  });

  await bot.start({
    onStart: (me) => logger.info(`✅ Bot @${me.username} started`),
  });
}

start().catch((error: unknown) => {
  logger.error('❌ Failed to start', error);
  process.exit(1);
});
