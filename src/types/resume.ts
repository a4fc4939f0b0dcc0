import { z } from 'zod';
import { listOf, nullableNumber, objectOrEmpty, stringList, text } from '../utils/schema';

export const SKILL_CATEGORIES = [
  'programming_languages',
  'frameworks_libraries',
  'databases',
  'cloud_platforms',
  'tools_software',
  'methodologies',
  'soft_skills',
] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export const personalInfoSchema = objectOrEmpty({
  full_name: text,
  email: text,
  phone: text,
  location: text,
  linkedin: text,
  github: text,
  portfolio: text,
  years_of_experience: nullableNumber,
});

export const technicalSkillsSchema = objectOrEmpty({
  programming_languages: stringList,
  frameworks_libraries: stringList,
  databases: stringList,
  cloud_platforms: stringList,
  tools_software: stringList,
  methodologies: stringList,
  soft_skills: stringList,
});

export const workExperienceSchema = z.object({
  job_title: text,
  company: text,
  location: text,
  start_date: text,
  end_date: text,
  duration: text,
  responsibilities: stringList,
  achievements: stringList,
  technologies_used: stringList,
});

export const educationSchema = z.object({
  school: text,
  degree: text,
  major: text,
  start_date: text,
  end_date: text,
  gpa: text,
  honors: stringList,
  relevant_courses: stringList,
});

export const projectSchema = z.object({
  name: text,
  description: text,
  role: text,
  duration: text,
  team_size: nullableNumber,
  technologies: stringList,
  achievements: stringList,
  github_url: text,
  demo_url: text,
});

// Shape the model is asked to return
export const resumeExtractionSchema = z.object({
  personal_info: personalInfoSchema,
  summary: text,
  technical_skills: technicalSkillsSchema,
  work_experience: listOf(workExperienceSchema),
  education: listOf(educationSchema),
  projects: listOf(projectSchema),
  certifications: stringList,
  notable_achievements: stringList,
  languages: stringList,
});

export type PersonalInfo = z.infer<typeof personalInfoSchema>;
export type TechnicalSkills = z.infer<typeof technicalSkillsSchema>;
export type WorkExperience = z.infer<typeof workExperienceSchema>;
export type Education = z.infer<typeof educationSchema>;
export type Project = z.infer<typeof projectSchema>;
export type ResumeExtraction = z.infer<typeof resumeExtractionSchema>;

export type ParsedResume = ResumeExtraction & {
  raw_text: string;
  parsing_confidence: number;
};

export const parsedResumeSchema = resumeExtractionSchema.extend({
  raw_text: text,
  parsing_confidence: z.number().min(0).max(1).default(0),
});

export interface ResumeRecord {
  id: string;
  user_id: string;
  file_name: string;
  parsed: ParsedResume;
  raw_text: string;
  parsing_confidence: number;
  created_at: string;
}

export function emptyTechnicalSkills(): TechnicalSkills {
  return {
    programming_languages: [],
    frameworks_libraries: [],
    databases: [],
    cloud_platforms: [],
    tools_software: [],
    methodologies: [],
    soft_skills: [],
  };
}

export function emptyResume(rawText = ''): ParsedResume {
  return {
    personal_info: {
      full_name: '',
      email: '',
      phone: '',
      location: '',
      linkedin: '',
      github: '',
      portfolio: '',
      years_of_experience: null,
    },
    summary: '',
    technical_skills: emptyTechnicalSkills(),
    work_experience: [],
    education: [],
    projects: [],
    certifications: [],
    notable_achievements: [],
    languages: [],
    raw_text: rawText,
    parsing_confidence: 0,
  };
}
