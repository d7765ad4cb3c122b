import { z } from 'zod';
import { INPUT_REQUIRED } from './analysis.constants';

const required = { required_error: INPUT_REQUIRED, invalid_type_error: INPUT_REQUIRED };

export const analyzeTextSchema = z.object(
  {
    text: z.string(required).min(1, INPUT_REQUIRED),
  },
  required,
);

export type AnalyzeTextBody = z.infer<typeof analyzeTextSchema>;
