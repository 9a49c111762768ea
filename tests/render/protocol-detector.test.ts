import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { delimiter, join } from 'path';
import {
  EnvironmentProtocolDetector,
  FixedProtocolDetector,
  findExecutable,
  isKittyTerminal,
  parseProtocolOverride,
  protocolLabel,
} from '../../src/render/protocol-detector.js';

function lookPathFor(available: string[]) {
  const looked: string[] = [];
  const lookPath = (command: string) => {
    looked.push(command);
    return available.includes(command) ? `/usr/bin/${command}` : null;
  };
  return { lookPath, looked };
}

describe('EnvironmentProtocolDetector', () => {
  it('prefers native graphics in kitty', () => {
    const { lookPath, looked } = lookPathFor(['img2sixel', 'chafa']);
    const detector = new EnvironmentProtocolDetector({ env: { TERM: 'xterm-kitty' }, lookPath });
    expect(detector.detect()).toBe('native');
    expect(looked).toEqual([]);
  });

  it('detects kitty by window id', () => {
    const { lookPath } = lookPathFor([]);
    expect(new EnvironmentProtocolDetector({ env: { KITTY_WINDOW_ID: '1' }, lookPath }).detect()).toBe('native');
  });

  it('falls back to img2sixel, then chafa, then ascii', () => {
    const env = { TERM: 'xterm-256color' };
    expect(new EnvironmentProtocolDetector({ env, lookPath: lookPathFor(['img2sixel', 'chafa']).lookPath }).detect())
      .toBe('sixel-helper');
    expect(new EnvironmentProtocolDetector({ env, lookPath: lookPathFor(['chafa']).lookPath }).detect())
      .toBe('general-helper');
    expect(new EnvironmentProtocolDetector({ env, lookPath: lookPathFor([]).lookPath }).detect()).toBe('ascii');
  });

  it('honors GEOPEEK_IMAGE_PROTOCOL over detection', () => {
    const { lookPath } = lookPathFor(['img2sixel']);
    const detector = new EnvironmentProtocolDetector({
      env: { TERM: 'xterm-kitty', GEOPEEK_IMAGE_PROTOCOL: 'ascii' },
      lookPath,
    });
    expect(detector.detect()).toBe('ascii');
  });

  it('ignores an unknown override', () => {
    const { lookPath } = lookPathFor(['chafa']);
    const detector = new EnvironmentProtocolDetector({ env: { GEOPEEK_IMAGE_PROTOCOL: 'iterm' }, lookPath });
    expect(detector.detect()).toBe('general-helper');
  });
});

describe('FixedProtocolDetector', () => {
  it('always returns its protocol', () => {
    expect(new FixedProtocolDetector('sixel-helper').detect()).toBe('sixel-helper');
  });
});

describe('parseProtocolOverride', () => {
  it('maps tier and helper names', () => {
    expect(parseProtocolOverride('kitty')).toBe('native');
    expect(parseProtocolOverride(' Sixel ')).toBe('sixel-helper');
    expect(parseProtocolOverride('img2sixel')).toBe('sixel-helper');
    expect(parseProtocolOverride('chafa')).toBe('general-helper');
    expect(parseProtocolOverride('ascii')).toBe('ascii');
    expect(parseProtocolOverride('')).toBeUndefined();
    expect(parseProtocolOverride(undefined)).toBeUndefined();
  });
});

describe('isKittyTerminal', () => {
  it('needs kitty in TERM or a kitty window id', () => {
    expect(isKittyTerminal({ TERM: 'xterm-kitty' })).toBe(true);
    expect(isKittyTerminal({ TERM: 'xterm-256color' })).toBe(false);
    expect(isKittyTerminal({ KITTY_WINDOW_ID: '  ' })).toBe(false);
  });
});

describe('protocolLabel', () => {
  it('names each tier', () => {
    expect(protocolLabel('native')).toBe('Kitty');
    expect(protocolLabel('sixel-helper')).toBe('Sixel');
    expect(protocolLabel('general-helper')).toBe('Chafa');
    expect(protocolLabel('ascii')).toBe('ASCII');
  });
});

describe.skipIf(process.platform === 'win32')('findExecutable', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'geopeek-path-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns the first executable on PATH', () => {
    const first = join(dir, 'a');
    const second = join(dir, 'b');
    mkdirSync(first);
    mkdirSync(second);
    writeFileSync(join(second, 'chafa'), '#!/bin/sh\n');
    chmodSync(join(second, 'chafa'), 0o755);

    expect(findExecutable('chafa', { PATH: [first, second].join(delimiter) })).toBe(join(second, 'chafa'));
  });

  it('skips files without an execute bit and directories', () => {
    writeFileSync(join(dir, 'chafa'), 'not a program');
    chmodSync(join(dir, 'chafa'), 0o644);
    mkdirSync(join(dir, 'img2sixel'));

    expect(findExecutable('chafa', { PATH: dir })).toBeNull();
    expect(findExecutable('img2sixel', { PATH: dir })).toBeNull();
  });

  it('returns null without PATH', () => {
    expect(findExecutable('chafa', {})).toBeNull();
  });
});
