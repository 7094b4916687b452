/**
 * Session Types
 */

export type Phase = 'idle' | 'active' | 'thinking' | 'speaking';

export const PHASES: readonly Phase[] = ['idle', 'active', 'thinking', 'speaking'];

export type Emotion = 'sleeping' | 'listening' | 'thinking' | 'talking';

// Mood shown by the external display for each phase
export const PHASE_EMOTIONS: Record<Phase, Emotion> = {
  idle: 'sleeping',
  active: 'listening',
  thinking: 'thinking',
  speaking: 'talking',
};

export function parsePhase(payload: string): Phase | null {
  const normalized = payload.trim().toLowerCase();
  return PHASES.find((phase) => phase === normalized) ?? null;
}

export type Session = {
  id: string;
  phase: Phase;
  createdAt: number;
  lastActivityAt: number;
};

export type PhaseChange = {
  from: Phase;
  to: Phase;
  reason: string;
  sessionId: string | null;
};

export type SessionConfig = {
  // Seconds in ACTIVE without a transcription before falling back to IDLE.
  // Must outlast a full-length recording plus recognition.
  idleTimeout: number;
  // Seconds in THINKING/SPEAKING without any reply or speaking traffic
  responseTimeout: number;
  // Go straight to SPEAKING after forwarding a request, skipping THINKING
  immediateSpeaking: boolean;
  goodbyePhrases: string[];
};

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  idleTimeout: 45,
  responseTimeout: 60,
  immediateSpeaking: true,
  goodbyePhrases: ['goodbye', 'good bye', 'bye bye', 'see you later', "that's all"],
};

export type SessionCommand = 'reset' | 'cancel';

export function parseCommand(payload: string): SessionCommand | null {
  const normalized = payload.trim().toLowerCase();
  if (normalized === 'reset' || normalized === 'cancel') {
    return normalized;
  }
  return null;
}
