/*
 * SonarQube CLI
 * Copyright (C) 2026 SonarSource Sàrl
 * mailto:info AT sonarsource DOT com
 *
 * This program is free software; you can redistribute it and/or
 * modify it under the terms of the GNU Lesser General Public
 * License as published by the Free Software Foundation; either
 * version 3 of the License, or (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the GNU
 * Lesser General Public License for more details.
 *
 * You should have received a copy of the GNU Lesser General Public License
 * along with this program; if not, write to the Free Software Foundation,
 * Inc., 51 Franklin Street, Fifth Floor, Boston, MA  02110-1301, USA.
 */

// Tests for messages.ts: info, success, warn, error, dryRunNotice
// Covers both mock mode (recordCall) and real output paths

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { info, success, warn, error, dryRunNotice } from '../../src/ui/messages.js';
import { setMockUi, getMockUiCalls, clearMockUiCalls } from '../../src/ui/mock.js';

// ─── Mock mode ────────────────────────────────────────────────────────────────

describe('messages: mock mode', () => {
  beforeEach(() => {
    setMockUi(true);
    clearMockUiCalls();
  });
  afterEach(() => {
    setMockUi(false);
  });

  it('records each call with its method name', () => {
    info('hello');
    success('done');
    warn('caution');
    error('oops');
    dryRunNotice('install -m 755 a b');

    expect(getMockUiCalls()).toEqual([
      { method: 'info', args: ['hello'] },
      { method: 'success', args: ['done'] },
      { method: 'warn', args: ['caution'] },
      { method: 'error', args: ['oops'] },
      { method: 'dryRun', args: ['install -m 755 a b'] },
    ]);
  });

  it('clears recorded calls when mock mode is switched off', () => {
    info('hello');
    setMockUi(false);
    expect(getMockUiCalls()).toEqual([]);
  });
});

// ─── Real output paths ────────────────────────────────────────────────────────

function capture(stream: NodeJS.WriteStream) {
  const output: string[] = [];
  const spy = vi.spyOn(stream, 'write').mockImplementation((s) => {
    output.push(String(s));
    return true;
  });
  return { output, spy };
}

describe('messages: real output (non-mock)', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('info writes to stdout', () => {
    const { output } = capture(process.stdout);
    info('test message');
    expect(output.join('')).toContain('test message');
  });

  it('success writes to stdout', () => {
    const { output } = capture(process.stdout);
    success('all good');
    expect(output.join('')).toContain('all good');
  });

  it('warn writes to stderr', () => {
    const { output } = capture(process.stderr);
    warn('be careful');
    expect(output.join('')).toContain('be careful');
  });

  it('error writes to stderr', () => {
    const { output } = capture(process.stderr);
    error('something failed');
    expect(output.join('')).toContain('something failed');
  });

  it('dryRunNotice tags the description', () => {
    const { output } = capture(process.stdout);
    dryRunNotice('download https://example.test/a -> /tmp/a');
    expect(output.join('')).toContain('[DRY-RUN]');
    expect(output.join('')).toContain('download https://example.test/a -> /tmp/a');
  });

  it('each message is a single line', () => {
    const { output } = capture(process.stdout);
    info('one');
    expect(output).toHaveLength(1);
    expect(output[0]?.endsWith('one\n')).toBe(true);
  });
});
