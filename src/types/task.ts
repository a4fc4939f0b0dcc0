export type TaskState = 'pending' | 'running' | 'completed' | 'failed';

export interface TaskRecord {
  id: string;
  user_id: string | null;
  kind: string;
  status: TaskState;
  progress: number;
  result: unknown;
  error: string | null;
  created_at: string;
  updated_at: string;
}
