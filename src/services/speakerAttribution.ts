import type { TranscriptSegment } from '../types/interview';
import { ValidationError } from '../utils/errors';
import { countWords } from './answerEvaluator';

export interface Attribution {
  speaker: string;
  text: string;
  segments: number;
}

/**
 * Picks the candidate's lines out of a diarized transcript. An explicit label wins;
 * otherwise the interviewer is assumed to speak first and the candidate is whoever
 * else talks the most.
 */
export function attributeSegments(segments: TranscriptSegment[], candidateSpeaker?: string): Attribution {
  const usable = segments.filter((segment) => segment.text.trim().length > 0);
  if (usable.length === 0) {
    throw new ValidationError('Transcript has no speech');
  }

  let speaker = candidateSpeaker?.trim();
  if (speaker) {
    if (!usable.some((segment) => segment.speaker === speaker)) {
      throw new ValidationError(`Speaker ${speaker} does not appear in the transcript`);
    }
  } else {
    const words = new Map<string, number>();
    for (const segment of usable) {
      words.set(segment.speaker, (words.get(segment.speaker) ?? 0) + countWords(segment.text));
    }
    const interviewer = usable[0].speaker;
    const others = [...words.entries()].filter(([name]) => name !== interviewer);
    if (others.length === 0) {
      speaker = interviewer;
    } else {
      others.sort((a, b) => b[1] - a[1]);
      speaker = others[0][0];
    }
  }

  const picked = usable.filter((segment) => segment.speaker === speaker);

  return {
    speaker,
    text: picked.map((segment) => segment.text.trim()).join(' '),
    segments: picked.length,
  };
}
