import type { ParsedResume } from './resume';
import type { ATSScore } from './optimizer';

export interface ResumeVersionRecord {
  id: string;
  user_id: string | null;
  name: string;
  base_version_id: string | null;
  target_company: string;
  target_position: string;
  target_jd_hash: string | null;
  description: string;
  resume_data: ParsedResume;
  ats_score: ATSScore | null;
  optimization_applied: string[];
  version_notes: string;
  is_active: boolean;
  created_at: string;
  last_modified: string;
}

export interface VersionPerformanceRecord {
  version_id: string;
  applications_sent: number;
  interviews_received: number;
  response_rate: number;
  feedback_received: string[];
  avg_ats_score: number;
  last_updated: string;
}

export interface FieldChange {
  v1: unknown;
  v2: unknown;
}

export interface VersionDifferences {
  personal_info?: Record<string, FieldChange>;
  work_experience?: { count_diff: number; content_changed: boolean };
  projects?: { count_diff: number; content_changed: boolean };
  skills?: { added: string[]; removed: string[] };
}

export interface VersionComparison {
  version1_id: string;
  version2_id: string;
  differences: VersionDifferences;
  similarity_score: number;
  recommendation: string;
}

export interface ComparisonRecord {
  id: string;
  version1_id: string;
  version2_id: string;
  comparison: VersionComparison;
  created_at: string;
}

export interface VersionReport {
  version_info: {
    id: string;
    name: string;
    target_company: string;
    target_position: string;
    created_at: string;
    last_modified: string;
    is_active: boolean;
  };
  performance_metrics: VersionPerformanceRecord | null;
  ats_score: ATSScore | null;
  optimization_applied: string[];
  recommendations: string[];
}
