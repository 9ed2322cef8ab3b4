import {Bot, BotError, GrammyError, HttpError} from 'grammy';
import {conversations, createConversation} from '@grammyjs/conversations';
import {createAddQuestionConversation} from '../conversations/addQuestion';
import {createCloneQuestionConversation} from '../conversations/cloneQuestion';
import {createEditQuestionConversation} from '../conversations/editQuestion';
import {registerCallbacks} from '../handlers/callbacks';
import {registerCommands} from '../handlers/commands';
import {createCategoryMenu} from '../menus/quizMenus';
import {MyContext} from '../types/context';
import {BotDeps} from '../types/deps';
import {logger} from '../utils/logger';

export const BOT_COMMANDS = [
  {command: 'play', description: 'Play a random quiz question'},
  {command: 'categories', description: 'Pick a category to play'},
  {command: 'stats', description: 'View your quiz statistics'},
  {command: 'list', description: 'List all quiz questions'},
  {command: 'add', description: 'Create a new quiz question'},
  {command: 'clone', description: 'Clone a quiz from a Telegram post'},
  {command: 'edit', description: 'Edit an existing question'},
  {command: 'remove', description: 'Delete a question'},
  {command: 'cancel', description: 'Cancel the current question or operation'},
  {command: 'help', description: 'Show all commands'},
];

/**
 * Builds the bot with every handler wired to the given services. The bot is
 * not started here.
 */
export function createBot(token: string, deps: BotDeps): Bot<MyContext> {
  const bot = new Bot<MyContext>(token);

  bot.use(conversations());
  bot.use(createConversation(createAddQuestionConversation(deps.questions), 'addQuestion'));
  bot.use(createConversation(createCloneQuestionConversation(deps.questions, deps.pollImporter), 'cloneQuestion'));
  bot.use(createConversation(createEditQuestionConversation(deps.questions), 'editQuestion'));

  const categoryMenu = createCategoryMenu(deps);
  bot.use(categoryMenu);

  registerCommands(bot, deps, categoryMenu);
  registerCallbacks(bot, deps);

  bot.catch(handleBotError);

  return bot;
}

function handleBotError(err: BotError<MyContext>) {
  const updateId = err.ctx.update.update_id;
  const cause = err.error;

  if (cause instanceof GrammyError) {
    logger.error(`Telegram rejected a request while handling update ${updateId}: ${cause.description}`);
  } else if (cause instanceof HttpError) {
    logger.error(`Could not reach Telegram while handling update ${updateId}`, cause);
  } else {
    logger.error(`Unhandled error while handling update ${updateId}`, cause);
  }
}
