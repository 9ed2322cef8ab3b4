import {InlineKeyboard} from 'grammy';
import {Question, QuizPrompt} from '../types/quiz';
import {truncate} from './formatUtils';

const BUTTON_LABEL_LENGTH = 40;

export interface QuizAnswerData {
  ownerId: string;
  questionId: string;
  optionIndex: number;
}

export const QUIZ_ANSWER_PATTERN = /^qa:(\d+):([A-Za-z0-9_-]+):(\d+)$/;
export const REMOVE_SELECT_PATTERN = /^rm:([A-Za-z0-9_-]+)$/;
export const REMOVE_CONFIRM_PATTERN = /^rm_yes:([A-Za-z0-9_-]+)$/;
export const REMOVE_CANCEL_DATA = 'rm_no';

export function quizAnswerData(ownerId: string, questionId: string, optionIndex: number): string {
  return `qa:${ownerId}:${questionId}:${optionIndex}`;
}

export function parseQuizAnswerData(data: string): QuizAnswerData | null {
  const match = data.match(QUIZ_ANSWER_PATTERN);
  if (!match) {
    return null;
  }
  return {ownerId: match[1], questionId: match[2], optionIndex: Number(match[3])};
}

export function quizAnswerKeyboard(ownerId: string, prompt: QuizPrompt): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  prompt.options.forEach((option, i) => {
    keyboard
      .text(`${i + 1}. ${truncate(option, BUTTON_LABEL_LENGTH)}`, quizAnswerData(ownerId, prompt.questionId, i))
      .row();
  });
  return keyboard;
}

/** One button per option; used when an author picks the correct answer. */
export function optionPickerKeyboard(options: string[], prefix = 'pick'): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  options.forEach((option, i) => {
    keyboard.text(`${i + 1}. ${truncate(option, BUTTON_LABEL_LENGTH)}`, `${prefix}:${i}`).row();
  });
  return keyboard;
}

export function removeSelectKeyboard(questions: Question[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  for (const question of questions) {
    keyboard.text(`ID ${question.id}: ${truncate(question.text, 30)}`, `rm:${question.id}`).row();
  }
  return keyboard;
}

export function removeConfirmKeyboard(questionId: string): InlineKeyboard {
  return new InlineKeyboard()
    .text('✅ Yes, delete it', `rm_yes:${questionId}`)
    .text('❌ No, keep it', REMOVE_CANCEL_DATA);
}
