import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { ParsedHand } from '~/types/poker';
import { config } from '../config';
import type { ReplayAction, ReplayState } from './replayState';
import { initialReplayState, replayReducer } from './replayState';

export interface ReplayStore extends ReplayState {
  next: () => void;
  prev: () => void;
  seek: (index: number) => void;
  reset: () => void;
}

/**
 * Replay cursor for one parsed hand. Renderers subscribe and redraw the
 * board and highlighted seat on every change.
 */
export function createReplayStore(hand: ParsedHand): StoreApi<ReplayStore> {
  return createStore<ReplayStore>()((set) => {
    const dispatch = (action: ReplayAction) => {
      set((state) => {
        const nextState = replayReducer(state, action);
        if (config.debug && nextState !== state) {
          console.debug(`[Replay] ${action.type} -> action ${nextState.cursor}`);
        }
        return nextState;
      });
    };

    return {
      ...initialReplayState(hand),

      next: () => dispatch({ type: 'NEXT' }),
      prev: () => dispatch({ type: 'PREV' }),
      seek: (index: number) => dispatch({ type: 'SEEK', index }),
      reset: () => dispatch({ type: 'RESET' }),
    };
  });
}
