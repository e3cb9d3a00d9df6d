import { describe, it, expect } from 'vitest';
import { SeenUpdates } from '../../core/relay/SeenUpdates.js';

describe('SeenUpdates', () => {
  it('should accept an id once', () => {
    const seen = new SeenUpdates();

    expect(seen.add(5)).toBe(true);
    expect(seen.add(5)).toBe(false);
  });

  it('should accept a lower id that has not been seen', () => {
    const seen = new SeenUpdates();
    seen.add(11);

    expect(seen.add(10)).toBe(true);
    expect(seen.add(10)).toBe(false);
    expect(seen.add(11)).toBe(false);
  });

  it('should treat ids pushed out of the window as seen', () => {
    const seen = new SeenUpdates(3);
    for (const id of [1, 2, 3, 4]) {
      seen.add(id);
    }

    expect(seen.add(1)).toBe(false);
    expect(seen.add(0)).toBe(false);
    expect(seen.add(2)).toBe(false);
    expect(seen.add(5)).toBe(true);
  });
});
