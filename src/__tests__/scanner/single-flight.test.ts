import { describe, expect, it } from 'vitest';
import { InFlightRegistry } from '../../services/scanner/index.js';

describe('InFlightRegistry', () => {
  it('lets only one holder take a key', () => {
    const registry = new InFlightRegistry();

    expect(registry.tryAcquire('page-1')).toBe(true);
    expect(registry.tryAcquire('page-1')).toBe(false);
    expect(registry.tryAcquire('page-2')).toBe(true);
    expect(registry.isHeld('page-1')).toBe(true);
    expect(registry.size).toBe(2);
  });

  it('frees the key on release', () => {
    const registry = new InFlightRegistry();
    registry.tryAcquire('page-1');
    registry.release('page-1');

    expect(registry.isHeld('page-1')).toBe(false);
    expect(registry.tryAcquire('page-1')).toBe(true);
  });
});
