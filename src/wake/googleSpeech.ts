/**
 * Google Cloud Speech-to-Text Transcriber
 * Batch recognition of one captured utterance (LINEAR16 mono).
 */

import { SpeechClient, protos } from "@google-cloud/speech";
import { TranscriptionError } from "../errors";
import { DEFAULT_TRANSCRIPTION_CONFIG, Transcriber } from "./types";

type IRecognizeResponse = protos.google.cloud.speech.v1.IRecognizeResponse;

export interface GoogleSpeechConfig {
  languageCode: string;
  sampleRate: number;
  enableAutomaticPunctuation: boolean;
  apiKey?: string;
}

export const DEFAULT_GOOGLE_SPEECH_CONFIG: GoogleSpeechConfig = {
  languageCode: DEFAULT_TRANSCRIPTION_CONFIG.languageCode,
  sampleRate: DEFAULT_TRANSCRIPTION_CONFIG.sampleRate,
  enableAutomaticPunctuation: true,
};

/**
 * Join the top alternative of every result into one utterance
 */
export function transcriptFromResponse(response: IRecognizeResponse): string {
  const parts: string[] = [];
  for (const result of response.results ?? []) {
    const transcript = result.alternatives?.[0]?.transcript?.trim();
    if (transcript) {
      parts.push(transcript);
    }
  }
  return parts.join(" ").trim();
}

export class GoogleSpeechTranscriber implements Transcriber {
  private client: SpeechClient | null = null;
  private config: GoogleSpeechConfig;

  constructor(config: Partial<GoogleSpeechConfig> = {}) {
    this.config = { ...DEFAULT_GOOGLE_SPEECH_CONFIG, ...config };
  }

  get sampleRate(): number {
    return this.config.sampleRate;
  }

  async initialize(): Promise<void> {
    console.log("[GoogleSpeech] Initializing...");

    if (this.config.apiKey) {
      this.client = new SpeechClient({ apiKey: this.config.apiKey });
      console.log("[GoogleSpeech] ✓ Initialized with API key");
    } else {
      this.client = new SpeechClient();
      console.log("[GoogleSpeech] ✓ Initialized with default credentials");
    }
  }

  async transcribe(samples: Int16Array): Promise<string> {
    if (!this.client) {
      throw new Error("GoogleSpeechTranscriber not initialized. Call initialize() first.");
    }

    const audio = Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);

    try {
      const [response] = await this.client.recognize({
        config: {
          encoding: protos.google.cloud.speech.v1.RecognitionConfig.AudioEncoding.LINEAR16,
          sampleRateHertz: this.config.sampleRate,
          languageCode: this.config.languageCode,
          enableAutomaticPunctuation: this.config.enableAutomaticPunctuation,
        },
        audio: { content: audio.toString("base64") },
      });

      return transcriptFromResponse(response);
    } catch (error) {
      console.error("[GoogleSpeech] ✗ Recognition failed:", error);
      throw new TranscriptionError(error);
    }
  }

  async destroy(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
    }
  }
}
