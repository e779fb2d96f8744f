import { describe, expect, it } from 'vitest';
import { normalizePortId, parsePortId } from '../src/utils/port.js';

describe('PortIds', () => {
  it('normalizes prefixes and fills in the default type', () => {
    expect(normalizePortId('HDMI-A-1')).toBe('hdmi:HDMI-A-1');
    expect(normalizePortId('DP-2', { defaultType: 'dp' })).toBe('dp:DP-2');
    expect(normalizePortId('DisplayPort:DP-1')).toBe('dp:DP-1');
    expect(normalizePortId('  ')).toBe('');
    expect(normalizePortId(undefined)).toBe('');
  });

  it('parses known connector types', () => {
    expect(parsePortId('hdmi:HDMI-A-1')).toEqual({ id: 'hdmi:HDMI-A-1', type: 'hdmi', name: 'HDMI-A-1' });
    expect(parsePortId('dp:DP-1')).toEqual({ id: 'dp:DP-1', type: 'dp', name: 'DP-1' });
  });

  it('rejects unknown connector types', () => {
    expect(parsePortId('usb:1')).toBeNull();
    expect(parsePortId('constructor:1')).toBeNull();
    expect(parsePortId('')).toBeNull();
  });
});
