/**
 * Unit tests for flag negotiation between typed parameters and raw meta flags
 */

import { describe, expect, it } from 'vitest';
import { encodeFlags, isSuppressedFlag, negotiateFlags } from '../src/core/flags.js';

const render = (tokens: Buffer[]) => tokens.map((token) => token.toString('latin1'));

describe('negotiateFlags', () => {
  it('should emit caller flags in order when no typed parameter is given', () => {
    expect(render(negotiateFlags({ quiet: false, flags: ['v', 't', 'N60'] }))).toEqual([
      'v',
      't',
      'N60',
    ]);
  });

  it('should emit nothing without flags or typed parameters', () => {
    expect(negotiateFlags({ quiet: false })).toEqual([]);
  });

  describe('opaque', () => {
    it('should replace caller O flags with the explicit opaque', () => {
      const tokens = render(
        negotiateFlags({ opaque: Buffer.from('42'), quiet: false, flags: ['O99', 'v', 'Oabc'] })
      );

      expect(tokens).toEqual(['O42', 'v']);
      expect(tokens.filter((token) => token.startsWith('O'))).toHaveLength(1);
    });

    it('should keep caller O flags when no opaque is given', () => {
      expect(render(negotiateFlags({ quiet: false, flags: ['O99'] }))).toEqual(['O99']);
    });
  });

  describe('delta', () => {
    it('should write a delta other than 1 and drop caller D flags', () => {
      expect(render(negotiateFlags({ delta: 5n, quiet: false, flags: ['D7', 'N0'] }))).toEqual([
        'D5',
        'N0',
      ]);
    });

    it('should never write a delta of 1', () => {
      expect(render(negotiateFlags({ delta: 1n, quiet: false }))).toEqual([]);
    });

    it('should drop caller D flags when delta is explicitly 1', () => {
      expect(render(negotiateFlags({ delta: 1n, quiet: false, flags: ['D7', 'v'] }))).toEqual([
        'v',
      ]);
    });

    it('should write a delta of 0', () => {
      expect(render(negotiateFlags({ delta: 0n, quiet: false }))).toEqual(['D0']);
    });

    it('should keep caller D flags when no delta is given', () => {
      expect(render(negotiateFlags({ quiet: false, flags: ['D7'] }))).toEqual(['D7']);
    });
  });

  describe('mode and quiet', () => {
    it('should always drop caller M and q flags', () => {
      expect(render(negotiateFlags({ quiet: false, flags: ['MS', 'q', 'k', 'qx', 'MD'] }))).toEqual([
        'k',
      ]);
    });

    it('should append q last when quiet', () => {
      expect(render(negotiateFlags({ opaque: Buffer.from('1'), quiet: true, flags: ['v'] }))).toEqual([
        'O1',
        'v',
        'q',
      ]);
    });

    it('should put the mode token first', () => {
      expect(
        render(
          negotiateFlags({ mode: 'MD', opaque: Buffer.from('7'), delta: 3n, quiet: true, flags: ['N0'] })
        )
      ).toEqual(['MD', 'O7', 'D3', 'N0', 'q']);
    });
  });

  it('should not emit the same caller flag twice', () => {
    expect(render(negotiateFlags({ quiet: false, flags: ['v', 'k', 'v'] }))).toEqual(['v', 'k']);
  });
});

describe('isSuppressedFlag', () => {
  it('should only suppress D when a delta was supplied', () => {
    expect(isSuppressedFlag('D2', { quiet: false })).toBe(false);
    expect(isSuppressedFlag('D2', { quiet: false, delta: 1n })).toBe(true);
  });

  it('should not suppress unrelated flags', () => {
    expect(isSuppressedFlag('T30', { quiet: true, opaque: Buffer.from('x'), delta: 2n })).toBe(false);
  });
});

describe('encodeFlags', () => {
  it('should prefix every token with a space', () => {
    expect(encodeFlags([Buffer.from('v'), Buffer.from('t')]).toString()).toBe(' v t');
  });

  it('should produce an empty suffix for no tokens', () => {
    expect(encodeFlags([]).length).toBe(0);
  });
});
