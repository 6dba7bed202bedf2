import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { describeError, errorCode, TraceabilityError } from './errors';

describe('TraceabilityError', () => {
  it('resolves its message from the catalog', () => {
    const error = new TraceabilityError('CATALOG_UNREADABLE', {
      messageParams: { path: 'reqs.json', reason: 'ENOENT' },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('CATALOG_UNREADABLE');
    expect(error.messageKey).toBe('errors.catalogUnreadable');
    expect(error.message).toBe('The requirements catalog at reqs.json could not be read: ENOENT');
  });

  it('localizes the message', () => {
    const error = new TraceabilityError('CONFIG_INVALID', {
      locale: 'tr',
      messageParams: { path: 'reqtrace.config.yaml', reason: 'prefix' },
    });

    expect(error.message).toBe('reqtrace.config.yaml konumundaki yapılandırma dosyası geçersiz: prefix');
  });

  it('describes unknown thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });

  it('reads system error codes raised by node itself', async () => {
    const missing = path.join(os.tmpdir(), 'reqtrace-errors-missing', 'nothing.yaml');
    const failure = await fs.stat(missing).then(
      () => undefined,
      (error: unknown) => error,
    );

    expect(errorCode(failure)).toBe('ENOENT');
    expect(describeError(failure)).toContain('ENOENT: no such file or directory');
  });

  it('reads codes from plain error-shaped values', () => {
    expect(errorCode({ message: 'denied', code: 'EACCES' })).toBe('EACCES');
    expect(describeError({ message: 'denied', code: 'EACCES' })).toBe('denied');
    expect(errorCode(new Error('no code'))).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
  });
});
