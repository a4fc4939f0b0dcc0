import fetch from 'node-fetch';
import { ConfigError, UpstreamError, ValidationError } from '../utils/errors';

export interface SpeechTranscriber {
  transcribe(audio: Buffer, mimeType: string): Promise<string>;
}

export interface AzureSpeechSettings {
  key: string;
  region: string;
  language: string;
}

const SUPPORTED_AUDIO: Record<string, string> = {
  'audio/wav': 'audio/wav; codecs=audio/pcm; samplerate=16000',
  'audio/x-wav': 'audio/wav; codecs=audio/pcm; samplerate=16000',
  'audio/wave': 'audio/wav; codecs=audio/pcm; samplerate=16000',
  'audio/ogg': 'audio/ogg; codecs=opus',
};

/**
 * Azure Speech short-audio REST recognition (clips up to 60 s)
 */
export class AzureSpeechTranscriber implements SpeechTranscriber {
  constructor(private readonly settings: AzureSpeechSettings | null) {}

  async transcribe(audio: Buffer, mimeType: string): Promise<string> {
    if (!this.settings) {
      throw new ConfigError('AZURE_SPEECH_KEY not configured');
    }
    const contentType = SUPPORTED_AUDIO[mimeType.toLowerCase()];
    if (!contentType) {
      throw new ValidationError(`Unsupported audio type ${mimeType}; upload WAV (16 kHz PCM) or OGG/Opus`);
    }
    if (audio.length === 0) {
      throw new ValidationError('Audio file is empty');
    }

    const { key, region, language } = this.settings;
    const url = `https://${region}.stt.speech.microsoft.com/speech/recognition/conversation/cognitiveservices/v1?language=${encodeURIComponent(language)}&format=simple`;

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Ocp-Apim-Subscription-Key': key,
        'Content-Type': contentType,
        Accept: 'application/json',
      },
      body: audio,
    });

    const raw = await response.text();
    if (!response.ok) {
      throw new UpstreamError(`Speech recognition failed with status ${response.status}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new UpstreamError('Speech service returned invalid JSON');
    }

    if (typeof json !== 'object' || json === null || !('RecognitionStatus' in json)) {
      throw new UpstreamError('Unexpected speech recognition response');
    }
    if (json.RecognitionStatus !== 'Success') {
      throw new UpstreamError(`Speech recognition status: ${String(json.RecognitionStatus)}`);
    }
    const text = 'DisplayText' in json && typeof json.DisplayText === 'string' ? json.DisplayText.trim() : '';
    if (!text) {
      throw new UpstreamError('No speech recognised in the audio');
    }
    return text;
  }
}
