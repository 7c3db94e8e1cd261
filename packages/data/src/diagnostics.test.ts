/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { collectDiagnostics, loggingDiagnosticHandler } from './diagnostics.js';
import { createLogger, type Logger } from './logger.js';

function mockLogger(): Logger {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn(), caught: vi.fn() };
}

describe('loggingDiagnosticHandler', () => {
  it('routes diagnostics by kind', () => {
    const log = mockLogger();
    const handler = loggingDiagnosticHandler(log);

    handler({ kind: 'UnknownGroupCode', message: 'unknown 9999', entityType: 'TEXT', line: 7 });
    handler({ kind: 'Comment', message: 'DXF comment', value: 'hello' });
    handler({ kind: 'DefaultApplied', message: 'layer defaulted' });

    expect(log.warn).toHaveBeenCalledWith('unknown 9999', { entityType: 'TEXT', line: 7 });
    expect(log.info).toHaveBeenCalledWith('DXF comment: hello', { entityType: undefined, line: undefined });
    expect(log.debug).toHaveBeenCalledWith('layer defaulted', undefined, { entityType: undefined, line: undefined });
    expect(log.error).not.toHaveBeenCalled();
  });

  it('keeps application group data quiet and warns about unclosed groups', () => {
    const log = mockLogger();
    const handler = loggingDiagnosticHandler(log);

    handler({ kind: 'ApplicationGroupData', message: 'skipped 1000', entityType: 'APPID', line: 5 });
    handler({ kind: 'UnclosedGroup', message: 'open {MYAPP', entityType: 'APPID', line: 9 });

    expect(log.debug).toHaveBeenCalledWith('skipped 1000', undefined, { entityType: 'APPID', line: 5 });
    expect(log.warn).toHaveBeenCalledWith('open {MYAPP', { entityType: 'APPID', line: 9 });
  });
});

describe('collectDiagnostics', () => {
  it('keeps diagnostics in arrival order', () => {
    const { handler, diagnostics } = collectDiagnostics();
    handler({ kind: 'VersionMismatch', message: 'a' });
    handler({ kind: 'SkippedRecord', message: 'b' });
    expect(diagnostics.map((diag) => diag.message)).toEqual(['a', 'b']);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('prefixes warnings with component and record context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('RecordDecoder').warn('bad tag', { handle: 0x1a, entityType: 'TEXT', line: 3 });
    expect(warn).toHaveBeenCalledWith('[RecordDecoder] #1a (TEXT) line 3 bad tag');
  });

  it('prints debug output only when DXF_DEBUG is set', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.stubEnv('DXF_DEBUG', '');
    vi.stubEnv('DXF_LOG_LEVEL', '');
    createLogger('TagReader').debug('quiet');
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv('DXF_DEBUG', 'true');
    createLogger('TagReader').debug('loud');
    expect(debug).toHaveBeenCalledWith('[TagReader] loud');
  });

  it('silences warnings at DXF_LOG_LEVEL=error', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubEnv('DXF_LOG_LEVEL', 'error');
    const log = createLogger('CLI');
    log.warn('hidden');
    log.error('shown', new Error('boom'));
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBe('[CLI] shown:');
  });
});
