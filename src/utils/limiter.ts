import { envNumber } from './env';

export const LANES = ['llm', 'corpus'] as const;

export type Lane = (typeof LANES)[number];

export type LimiterConfig = Record<Lane, number>;

const defaultConfig: LimiterConfig = {
  llm: 4,
  corpus: 2,
};

interface LaneState {
  max: number;
  running: number;
  queue: Array<() => void>;
}

export class LaneLimiter {
  private lanes: Map<Lane, LaneState> = new Map();

  constructor(config?: Partial<LimiterConfig>) {
    const merged: LimiterConfig = { ...defaultConfig, ...config };
    for (const lane of LANES) {
      const max = Number.isFinite(merged[lane]) ? Math.max(1, Math.floor(merged[lane])) : defaultConfig[lane];
      this.lanes.set(lane, { max, running: 0, queue: [] });
    }
  }

  private state(lane: Lane): LaneState {
    const state = this.lanes.get(lane);
    if (!state) {
      throw new Error(`Unknown limiter lane: ${lane}`);
    }
    return state;
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    const state = this.state(lane);

    if (state.running < state.max) {
      state.running++;
    } else {
      // the releasing task hands its slot over, running stays unchanged
      await new Promise<void>((resolve) => state.queue.push(resolve));
    }

    try {
      return await fn();
    } finally {
      this.release(state);
    }
  }

  pending(lane: Lane): number {
    return this.state(lane).queue.length;
  }

  private release(state: LaneState): void {
    const next = state.queue.shift();
    if (next) {
      next();
    } else {
      state.running--;
    }
  }
}

const globalLimiter = new LaneLimiter({
  llm: envNumber(process.env.LLM_CONCURRENCY, defaultConfig.llm),
  corpus: envNumber(process.env.CORPUS_CONCURRENCY, defaultConfig.corpus),
});

export function limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
  return globalLimiter.limit(lane, fn);
}
