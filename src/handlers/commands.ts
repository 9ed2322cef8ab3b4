import {Bot, CommandContext, Context, Filter} from 'grammy';
import {Menu} from '@grammyjs/menu';
import {isQuizBotError} from '../services/errors';
import {descriptorFromPoll} from '../services/pollImportService';
import {QuizEngine} from '../services/quizEngine';
import {MyContext} from '../types/context';
import {BotDeps} from '../types/deps';
import {describeError, formatCategories, formatPrompt, formatQuestionDetails, formatQuestionList, formatUserStats} from '../utils/formatUtils';
import {parseQuestionId, toUserId} from '../utils/idUtils';
import {quizAnswerKeyboard, removeConfirmKeyboard, removeSelectKeyboard} from '../utils/keyboards';
import {logger} from '../utils/logger';

const REMOVE_PICKER_LIMIT = 10;

export const HELP_TEXT =
  '📚 Available commands\n\n' +
  '🔹 /play [category] - Play a random quiz question\n' +
  '🔹 /categories - Pick a category to play\n' +
  '🔹 /stats - View your quiz statistics\n' +
  '🔹 /list - List all quiz questions\n' +
  '🔹 /add - Create a new quiz question\n' +
  '🔹 /clone <link> - Clone a quiz from a Telegram post\n' +
  '🔹 /edit <id> - Edit an existing question\n' +
  '🔹 /remove [id] - Delete a question\n' +
  '🔹 /cancel - Cancel the current question or operation\n' +
  '🔹 /help - Show this help message\n\n' +
  '💡 Forward a poll to me and I will offer to save it as a quiz question.';

export function registerCommands(bot: Bot<MyContext>, deps: BotDeps, categoryMenu: Menu<MyContext>) {
  bot.command('start', handleStart);
  bot.command('help', (ctx) => ctx.reply(HELP_TEXT));
  bot.command('play', (ctx) => handlePlay(ctx, deps.engine));
  bot.command('categories', (ctx) => handleCategories(ctx, deps, categoryMenu));
  bot.command('stats', (ctx) => handleStats(ctx, deps.engine));
  bot.command('list', (ctx) => handleList(ctx, deps));
  bot.command('add', (ctx) => ctx.conversation.enter('addQuestion'));
  bot.command('clone', handleClone);
  bot.command('edit', (ctx) => handleEdit(ctx, deps));
  bot.command('remove', (ctx) => handleRemove(ctx, deps));
  bot.command('cancel', (ctx) => handleCancel(ctx, deps.engine));

  bot.on('message:poll', handleForwardedPoll);

  bot.on('message:text', async (ctx) => {
    if (ctx.message.text.startsWith('/')) {
      return;
    }
    await ctx.reply(
      'Available commands:\n' +
      '/play - Play a quiz question\n' +
      '/add - Create a question\n' +
      '/help - All commands'
    );
  });
}

/**
 * Replies with the text for a failed operation; unexpected errors are logged.
 */
export async function replyWithError(ctx: Context, error: unknown, action: string) {
  if (!isQuizBotError(error) || error.code === 'STORE_UNAVAILABLE') {
    logger.error(`Error while ${action}`, error);
  }
  await ctx.reply(describeError(error));
}

/**
 * Starts a session for the sender and sends the question with answer buttons.
 */
export async function startQuizForUser(ctx: Context, engine: QuizEngine, category?: string) {
  const telegramId = ctx.from?.id;

  if (!telegramId) {
    return ctx.reply('Error: could not determine your user ID');
  }

  const userId = toUserId(telegramId);

  try {
    const prompt = await engine.startSession(userId, {category});
    await ctx.reply(formatPrompt(prompt), {
      reply_markup: quizAnswerKeyboard(userId, prompt),
    });
  } catch (error) {
    await replyWithError(ctx, error, 'starting a quiz');
  }
}

async function handleStart(ctx: CommandContext<MyContext>) {
  const name = ctx.from?.first_name ?? 'there';
  await ctx.reply(
    `Hello, ${name}! I'm the Quiz Bot 🎯\n\n` +
    'I can help you play and create quiz questions.\n\n' +
    'Use /play to start a quiz\n' +
    'Use /add to create a new quiz question\n' +
    'Use /help to see all available commands'
  );
}

async function handlePlay(ctx: CommandContext<MyContext>, engine: QuizEngine) {
  const category = ctx.match.trim();
  await startQuizForUser(ctx, engine, category || undefined);
}

async function handleCategories(ctx: CommandContext<MyContext>, deps: BotDeps, categoryMenu: Menu<MyContext>) {
  try {
    const categories = await deps.questions.listCategories();
    if (categories.length === 0) {
      return ctx.reply('📭 No questions available. Add some with /add!');
    }
    await ctx.reply(`${formatCategories(categories)}\n\nTap a category to play:`, {reply_markup: categoryMenu});
  } catch (error) {
    await replyWithError(ctx, error, 'listing categories');
  }
}

async function handleStats(ctx: CommandContext<MyContext>, engine: QuizEngine) {
  const telegramId = ctx.from?.id;

  if (!telegramId) {
    return ctx.reply('Error: could not determine your user ID');
  }

  try {
    const stats = await engine.getUserStats(toUserId(telegramId));
    await ctx.reply(formatUserStats(stats));
  } catch (error) {
    await replyWithError(ctx, error, 'reading statistics');
  }
}

async function handleList(ctx: CommandContext<MyContext>, deps: BotDeps) {
  try {
    const questions = await deps.questions.listQuestions();
    await ctx.reply(formatQuestionList(questions));
  } catch (error) {
    await replyWithError(ctx, error, 'listing questions');
  }
}

async function handleClone(ctx: CommandContext<MyContext>) {
  const url = ctx.match.trim();
  if (url) {
    await ctx.conversation.enter('cloneQuestion', {kind: 'url', url});
    return;
  }
  await ctx.conversation.enter('cloneQuestion');
}

async function handleEdit(ctx: CommandContext<MyContext>, deps: BotDeps) {
  const id = parseQuestionId(ctx.match);

  if (!id) {
    return ctx.reply(
      '⚠️ Usage: /edit <id>\n\n' +
      'Use /list to see question IDs'
    );
  }

  try {
    const question = await deps.questions.getQuestion(id);
    if (!question) {
      return ctx.reply(`⚠️ No question found with ID ${id}. Use /list to see available questions.`);
    }
    await ctx.conversation.enter('editQuestion', id);
  } catch (error) {
    await replyWithError(ctx, error, 'opening a question for editing');
  }
}

async function handleRemove(ctx: CommandContext<MyContext>, deps: BotDeps) {
  const input = ctx.match.trim();

  try {
    if (!input) {
      const questions = await deps.questions.listQuestions();
      if (questions.length === 0) {
        return ctx.reply('📭 No quiz questions available to remove.');
      }
      return ctx.reply('Select a question to remove:', {
        reply_markup: removeSelectKeyboard(questions.slice(0, REMOVE_PICKER_LIMIT)),
      });
    }

    const id = parseQuestionId(input);
    const question = id ? await deps.questions.getQuestion(id) : undefined;

    if (!question) {
      return ctx.reply(`⚠️ No question found with ID ${input}. Use /list to see available questions.`);
    }

    await ctx.reply(
      `Are you sure you want to delete this question?\n\n${formatQuestionDetails(question)}`,
      {reply_markup: removeConfirmKeyboard(question.id)}
    );
  } catch (error) {
    await replyWithError(ctx, error, 'preparing a removal');
  }
}

async function handleCancel(ctx: CommandContext<MyContext>, engine: QuizEngine) {
  const telegramId = ctx.from?.id;

  if (!telegramId) {
    return ctx.reply('Error: could not determine your user ID');
  }

  if (engine.cancelSession(toUserId(telegramId))) {
    return ctx.reply('❌ Quiz question cancelled. Use /play to start a new one.');
  }
  await ctx.reply('Nothing to cancel. Use /help to see available commands.');
}

async function handleForwardedPoll(ctx: Filter<MyContext, 'message:poll'>) {
  const descriptor = descriptorFromPoll(ctx.message.poll);
  await ctx.conversation.enter('cloneQuestion', {kind: 'poll', descriptor});
}
