/**
 * Session State Machine
 * Single source of truth for the conversational phase. Reacts to bus events
 * and republishes the phase (retained) on every transition.
 *
 *   IDLE --wake--> ACTIVE --text--> SPEAKING --speaking=false--> IDLE
 *                    |  goodbye / no speech / idle timeout --> IDLE
 *
 * Bus topics carry no cross-topic ordering, so every handler is guarded by the
 * current phase and stale events are dropped.
 */

import { EventEmitter } from "events";
import { MessageBus, parseFlag, TopicMap } from "../bus/types";
import {
  DEFAULT_SESSION_CONFIG,
  parseCommand,
  Phase,
  PHASE_EMOTIONS,
  PhaseChange,
  Session,
  SessionConfig,
} from "./types";

export interface SessionStateMachineEvents {
  phaseChange: (change: PhaseChange) => void;
  llmRequest: (text: string) => void;
}

export type SessionStateMachineOptions = {
  bus: MessageBus;
  topics: TopicMap;
  config?: Partial<SessionConfig>;
  now?: () => number;
  // How often timeouts are checked (ms)
  checkInterval?: number;
};

export class SessionStateMachine extends EventEmitter {
  private bus: MessageBus;
  private topics: TopicMap;
  private config: SessionConfig;
  private now: () => number;
  private checkInterval: number;

  private phase: Phase = "idle";
  private session: Session | null = null;
  private lastActivity = 0;
  private timeoutTimer: NodeJS.Timeout | null = null;
  private isRunning = false;

  constructor(options: SessionStateMachineOptions) {
    super();
    this.bus = options.bus;
    this.topics = options.topics;
    this.config = { ...DEFAULT_SESSION_CONFIG, ...options.config };
    this.now = options.now ?? Date.now;
    this.checkInterval = options.checkInterval ?? 1000;
  }

  start(): void {
    if (this.isRunning) {
      console.warn("[SessionStateMachine] Already running");
      return;
    }

    console.log("[SessionStateMachine] Starting...");
    this.isRunning = true;

    this.bus.subscribe(this.topics.command, (payload) => this.handleCommand(payload));
    this.bus.subscribe(this.topics.wakeDetected, (payload) => this.handleWakeDetected(payload));
    this.bus.subscribe(this.topics.transcription, (payload) => this.handleTranscription(payload));
    this.bus.subscribe(this.topics.noSpeech, (payload) => this.handleNoSpeech(payload));
    this.bus.subscribe(this.topics.llmResponse, (payload) => this.handleLlmResponse(payload));
    this.bus.subscribe(this.topics.speaking, (payload) => this.handleSpeaking(payload));

    // Phase is retained, so a reconnect only needs to republish it
    this.bus.onConnect(() => {
      if (this.isRunning) {
        this.publishPhase();
      }
    });

    this.publishPhase();

    this.timeoutTimer = setInterval(() => this.checkTimeouts(), this.checkInterval);
    this.timeoutTimer.unref();

    console.log(`[SessionStateMachine] Ready. Phase: ${this.phase}`);
  }

  stop(): void {
    console.log("[SessionStateMachine] Stopping...");
    this.isRunning = false;
    if (this.timeoutTimer) {
      clearInterval(this.timeoutTimer);
      this.timeoutTimer = null;
    }
  }

  getPhase(): Phase {
    return this.phase;
  }

  getSession(): Session | null {
    return this.session ? { ...this.session } : null;
  }

  /**
   * Runs once per check interval; public so the timeout path can be driven directly.
   */
  checkTimeouts(): void {
    const idleFor = (this.now() - this.lastActivity) / 1000;

    if (this.phase === "active" && idleFor > this.config.idleTimeout) {
      console.log(`[SessionStateMachine] ⏰ Timeout (${this.config.idleTimeout}s). ACTIVE → IDLE`);
      this.setPhase("idle", "idle_timeout");
    } else if ((this.phase === "thinking" || this.phase === "speaking") && idleFor > this.config.responseTimeout) {
      console.log(`[SessionStateMachine] ⏰ No reply traffic for ${this.config.responseTimeout}s. ${this.phase.toUpperCase()} → IDLE`);
      this.setPhase("idle", "response_timeout");
    }
  }

  private handleCommand(payload: string): void {
    const command = parseCommand(payload);
    if (!command) {
      console.warn(`[SessionStateMachine] Ignoring unknown command: "${payload}"`);
      return;
    }

    console.log(`[SessionStateMachine] ⚠️ ${command.toUpperCase()} command received! ${this.phase.toUpperCase()} → IDLE`);
    this.setPhase("idle", command);
  }

  private handleWakeDetected(payload: string): void {
    const confidence = Number.parseFloat(payload);
    if (!Number.isFinite(confidence)) {
      console.warn(`[SessionStateMachine] Ignoring malformed wake payload: "${payload}"`);
      return;
    }

    if (this.phase !== "idle") {
      console.log(`[SessionStateMachine] Wake (${confidence.toFixed(2)}) ignored while ${this.phase}`);
      return;
    }

    const now = this.now();
    this.session = {
      id: `session-${now}`,
      phase: "active",
      createdAt: now,
      lastActivityAt: now,
    };
    this.touch();

    console.log(`[SessionStateMachine] 🔊 Wake word detected (${confidence.toFixed(2)})! IDLE → ACTIVE`);
    this.setPhase("active", "wake_detected");
  }

  private handleTranscription(payload: string): void {
    const text = payload.trim();
    if (this.phase !== "active") {
      console.log(`[SessionStateMachine] Transcription ignored while ${this.phase}: "${text}"`);
      return;
    }
    if (!text) {
      console.warn("[SessionStateMachine] Ignoring empty transcription");
      return;
    }

    console.log(`[SessionStateMachine] User said: ${text}`);
    this.touch();

    if (this.isGoodbye(text)) {
      console.log("[SessionStateMachine] 👋 Goodbye detected! ACTIVE → IDLE");
      this.setPhase("idle", "goodbye");
      return;
    }

    this.bus.publish(this.topics.llmRequest, text);
    this.emit("llmRequest", text);

    // Marking SPEAKING right away keeps wake word scoring disabled while the reply is computed
    const next: Phase = this.config.immediateSpeaking ? "speaking" : "thinking";
    console.log(`[SessionStateMachine] Forwarded to LLM. ACTIVE → ${next.toUpperCase()}`);
    this.setPhase(next, "llm_request");
  }

  private handleNoSpeech(payload: string): void {
    if (this.phase !== "active") {
      return;
    }

    console.log(`[SessionStateMachine] ❌ No usable speech (${payload.trim() || "unknown"}). ACTIVE → IDLE`);
    this.setPhase("idle", "no_speech");
  }

  private handleLlmResponse(payload: string): void {
    if (this.phase === "thinking" || this.phase === "speaking") {
      console.log(`[SessionStateMachine] 🤖 Reply received (${payload.length} chars)`);
      this.touch();
    }
  }

  private handleSpeaking(payload: string): void {
    const speaking = parseFlag(payload);
    if (speaking === null) {
      console.warn(`[SessionStateMachine] Ignoring malformed speaking flag: "${payload}"`);
      return;
    }

    if (speaking) {
      if (this.phase === "active" || this.phase === "thinking") {
        console.log(`[SessionStateMachine] Robot speaking. ${this.phase.toUpperCase()} → SPEAKING`);
        this.touch();
        this.setPhase("speaking", "speaking_started");
      } else if (this.phase === "speaking") {
        this.touch();
      }
      return;
    }

    if (this.phase === "speaking") {
      console.log("[SessionStateMachine] Robot finished. SPEAKING → IDLE");
      this.setPhase("idle", "speaking_finished");
    }
  }

  private isGoodbye(text: string): boolean {
    const normalized = text.toLowerCase();
    return this.config.goodbyePhrases.some((phrase) => normalized.includes(phrase.toLowerCase()));
  }

  private touch(): void {
    this.lastActivity = this.now();
    if (this.session) {
      this.session.lastActivityAt = this.lastActivity;
    }
  }

  private setPhase(next: Phase, reason: string): void {
    const previous = this.phase;
    const sessionId = this.session?.id ?? null;

    this.phase = next;
    if (next === "idle") {
      this.session = null;
    } else {
      if (this.session) {
        this.session.phase = next;
      }
      if (previous !== next) {
        this.touch();
      }
    }

    this.publishPhase();

    if (previous !== next) {
      console.log(`[SessionStateMachine] Phase: ${previous} → ${next} (${reason})`);
      this.emit("phaseChange", { from: previous, to: next, reason, sessionId });
    }
  }

  private publishPhase(): void {
    this.bus.publish(this.topics.state, this.phase, { retain: true });
    this.bus.publish(this.topics.emotion, PHASE_EMOTIONS[this.phase], { retain: true });
  }
}
