import { describe, expect, it, vi } from 'vitest';
import { parseHandScript } from '~/lib/script/parser';
import { createReplayStore } from './replayStore';

const HAND = parseHandScript(['SB bet 1', 'BB call 1', 'FLOP 2c 3c 4c', 'BB check'], 2);

describe('createReplayStore', () => {
  it('steps through the hand', () => {
    const store = createReplayStore(HAND);
    expect(store.getState().caption).toBe('SB bet 1');

    store.getState().next();
    store.getState().next();
    expect(store.getState().cursor).toBe(2);
    expect(store.getState().street).toBe('flop');

    store.getState().prev();
    expect(store.getState().cursor).toBe(1);
    expect(store.getState().activeSeat).toBe(1);

    store.getState().seek(3);
    expect(store.getState().caption).toBe('BB check');

    store.getState().reset();
    expect(store.getState().cursor).toBe(0);
  });

  it('notifies subscribers only when the cursor moves', () => {
    const store = createReplayStore(HAND);
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    store.getState().prev();
    expect(listener).not.toHaveBeenCalled();

    store.getState().next();
    expect(listener).toHaveBeenCalledTimes(1);
    unsubscribe();
  });

  it('keeps separate stores independent', () => {
    const a = createReplayStore(HAND);
    const b = createReplayStore(HAND);
    a.getState().seek(3);
    expect(b.getState().cursor).toBe(0);
  });
});
