import {Context} from 'grammy';
import {type Conversation, type ConversationFlavor} from '@grammyjs/conversations';

export type MyContext = ConversationFlavor<Context>;

/** Conversations run on a plain context; services are reached through closures. */
export type QuizConversation = Conversation<MyContext, Context>;
