import { z } from 'zod';

export const queryRequestSchema = z.object({
  documents: z
    .string({ required_error: 'Field required' })
    .trim()
    .url('URL to a single PDF or DOCX document.')
    .refine((value) => /^https?:\/\//i.test(value), 'Only http and https URLs are supported.'),
  questions: z
    .array(z.string().trim().min(1, 'Questions must not be empty.'), { required_error: 'Field required' })
    .min(1, 'List should have at least 1 item after validation, not 0'),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

export interface QueryResponse {
  answers: string[];
}

export interface QueryHandler {
  run(request: QueryRequest): Promise<QueryResponse>;
}
