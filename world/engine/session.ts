import type { WorldState } from '../state/worldState';

export interface SessionSummary {
  readonly finalScore: number;
  /** High score loaded when the session started */
  readonly previousHighScore: number;
  readonly isNewHighScore: boolean;
}

/** Compare the final score with the high score loaded at session start */
export function summarizeSession(state: WorldState): SessionSummary {
  return {
    finalScore: state.score,
    previousHighScore: state.highScore,
    isNewHighScore: state.score > state.highScore,
  };
}
