// Procedural sound effects for retro game cues
// No audio files needed - all sounds are generated as raw PCM at startup

import type { AudioCue } from '@/types/game';

export const SAMPLE_RATE = 22050;
const MAX_AMPLITUDE = 32767;

/** Output device. Playback is best-effort; the game never waits on it. */
export interface AudioSink {
  init(sampleRate: number): void;
  play(samples: Int16Array, sampleRate: number): void;
}

interface ToneSpec {
  kind: 'tone';
  frequency: number;
  durationMs: number;
  volume: number;
}

interface NoiseSpec {
  kind: 'noise';
  durationMs: number;
  volume: number;
}

type CueSpec = ToneSpec | NoiseSpec;

export const CUE_SPECS: Record<AudioCue, CueSpec> = {
  shoot: { kind: 'tone', frequency: 880, durationMs: 60, volume: 0.25 },
  enemy_shoot: { kind: 'tone', frequency: 440, durationMs: 80, volume: 0.18 },
  explosion: { kind: 'noise', durationMs: 160, volume: 0.3 },
  highscore: { kind: 'tone', frequency: 1320, durationMs: 220, volume: 0.3 },
};

function sampleCount(durationMs: number, sampleRate: number): number {
  return Math.max(1, Math.floor(sampleRate * (durationMs / 1000)));
}

// Plain sine blip
export function synthesizeTone(
  frequency: number,
  durationMs: number,
  volume: number,
  sampleRate = SAMPLE_RATE
): Int16Array {
  const n = sampleCount(durationMs, sampleRate);
  const amp = Math.trunc(MAX_AMPLITUDE * volume);
  const out = new Int16Array(n);
  for (let i = 0; i < n; i++) {
    const t = i / sampleRate;
    out[i] = Math.trunc(amp * Math.sin(2 * Math.PI * frequency * t));
  }
  return out;
}

// White noise with a linear fade-out
export function synthesizeNoisePop(
  durationMs: number,
  volume: number,
  sampleRate = SAMPLE_RATE,
  random: () => number = Math.random
): Int16Array {
  const n = sampleCount(durationMs, sampleRate);
  const out = new Int16Array(n);
  for (let i = 0; i < n; i++) {
    const decay = 1 - i / n;
    out[i] = Math.trunc(MAX_AMPLITUDE * volume * decay * (random() * 2 - 1));
  }
  return out;
}

export function synthesizeCue(
  cue: AudioCue,
  sampleRate = SAMPLE_RATE,
  random: () => number = Math.random
): Int16Array {
  const spec = CUE_SPECS[cue];
  switch (spec.kind) {
    case 'tone':
      return synthesizeTone(spec.frequency, spec.durationMs, spec.volume, sampleRate);
    case 'noise':
      return synthesizeNoisePop(spec.durationMs, spec.volume, sampleRate, random);
  }
}

export function synthesizeAllCues(sampleRate = SAMPLE_RATE): Record<AudioCue, Int16Array> {
  return {
    shoot: synthesizeCue('shoot', sampleRate),
    enemy_shoot: synthesizeCue('enemy_shoot', sampleRate),
    explosion: synthesizeCue('explosion', sampleRate),
    highscore: synthesizeCue('highscore', sampleRate),
  };
}

/**
 * Owns the synthesized cues and a sink. If the sink fails to initialize the
 * manager turns itself off for the rest of the session.
 */
export class SoundManager {
  private sink: AudioSink | null;
  private cues: Record<AudioCue, Int16Array> | null = null;
  private disabled = false;
  private playbackWarned = false;

  constructor(sink: AudioSink | null) {
    this.sink = sink;
    if (!sink) {
      this.disabled = true;
      return;
    }
    try {
      sink.init(SAMPLE_RATE);
      this.cues = synthesizeAllCues();
    } catch (error) {
      console.warn('Audio unavailable, sound disabled:', error);
      this.disabled = true;
    }
  }

  get available(): boolean {
    return !this.disabled;
  }

  play(cue: AudioCue): void {
    if (this.disabled || !this.sink || !this.cues) return;
    try {
      this.sink.play(this.cues[cue], SAMPLE_RATE);
    } catch (error) {
      if (!this.playbackWarned) {
        this.playbackWarned = true;
        console.warn(`Failed to play "${cue}":`, error);
      }
    }
  }
}
