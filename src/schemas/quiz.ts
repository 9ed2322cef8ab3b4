import {z} from 'zod';

/** A stored question; the correct index must point at one of the options. */
export const QuestionSchema = z
  .object({
    id: z.string().min(1),
    category: z.string(),
    text: z.string().min(1),
    options: z.array(z.string().min(1)).min(2),
    correctIndex: z.number().int().nonnegative(),
    explanation: z.string().optional(),
    createdBy: z.string(),
    createdAt: z.string(),
  })
  .refine(q => q.correctIndex < q.options.length, {
    message: 'correctIndex must point at one of the options',
    path: ['correctIndex'],
  });

export const QuestionListSchema = z.array(QuestionSchema);

export const CategoryStatSchema = z.object({
  answered: z.number().int().nonnegative(),
  correct: z.number().int().nonnegative(),
});

export const UserStatSchema = z.object({
  userId: z.string(),
  name: z.string().optional(),
  answered: z.number().int().nonnegative(),
  correct: z.number().int().nonnegative(),
  categories: z.record(z.string(), CategoryStatSchema),
});

/** users.json: stats keyed by user id */
export const UserStatMapSchema = z.record(z.string(), UserStatSchema);
