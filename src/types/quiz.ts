import {z} from 'zod';
import {CategoryStatSchema, QuestionSchema, UserStatSchema} from '../schemas/quiz';

export type Question = z.infer<typeof QuestionSchema>;

export type QuestionDraft = Omit<Question, 'id' | 'createdAt'> & {
  createdAt?: string;
};

export type QuestionPatch = Partial<Omit<Question, 'id' | 'createdBy' | 'createdAt'>>;

export type CategoryStat = z.infer<typeof CategoryStatSchema>;

export type UserStat = z.infer<typeof UserStatSchema>;

export type SessionStatus = 'pending' | 'answered' | 'expired';

export interface QuizSession {
  userId: string;
  question: Question;
  posedAt: Date;
  status: SessionStatus;
}

/** What a player sees: the correct index is never part of it. */
export interface QuizPrompt {
  questionId: string;
  category: string;
  text: string;
  options: string[];
}

export interface AnswerResult {
  questionId: string;
  correct: boolean;
  chosenIndex: number;
  correctIndex: number;
  correctOption: string;
  explanation?: string;
  stats: UserStat;
  accuracy: number;
}

export interface BotStats {
  totalQuestions: number;
  totalUsers: number;
  totalAnswered: number;
  totalCorrect: number;
  categories: Record<string, number>;
}

export interface CategorySummary {
  name: string;
  questionCount: number;
}

export interface PollDescriptor {
  question: string;
  options: string[];
  correctIndex?: number;
  explanation?: string;
  source: string;
}
