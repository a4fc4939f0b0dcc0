import { z } from 'zod';
import { stringList, text } from '../utils/schema';

export const jobDescriptionSchema = z.object({
  title: text,
  company: text,
  location: text,
  employment_type: text,
  experience_level: text,
  summary: text,
  requirements: stringList,
  responsibilities: stringList,
  skills_required: stringList,
  nice_to_have: stringList,
});

export type ParsedJobDescription = z.infer<typeof jobDescriptionSchema>;

export interface JobDescriptionRecord {
  id: string;
  user_id: string;
  raw_text: string;
  parsed: ParsedJobDescription;
  created_at: string;
}
