import { describe, expect, it } from 'vitest';

import { formatServerStatus, shortDescription } from '../src/chat/render';
import { ConnectionError } from '../src/core/errors';

describe('shortDescription', () => {
  it('keeps only the first line', () => {
    expect(shortDescription('Read a file\nReturns its full contents.')).toBe(
      'Read a file'
    );
  });

  it('cuts long descriptions to 80 characters', () => {
    const result = shortDescription('x'.repeat(100));
    expect(result).toBe(`${'x'.repeat(79)}…`);
    expect(result).toHaveLength(80);
  });

  it('handles missing descriptions', () => {
    expect(shortDescription(undefined)).toBe('');
  });
});

describe('formatServerStatus', () => {
  it('reports connected servers with their tool count', () => {
    expect(
      formatServerStatus({
        name: 'filesystem',
        status: 'connected',
        toolCount: 11,
      })
    ).toBe(
      "✅ Connected to server 'filesystem' with 11 tools"
    );
    expect(
      formatServerStatus({ name: 'time', status: 'connected', toolCount: 1 })
    ).toBe(
      "✅ Connected to server 'time' with 1 tool"
    );
  });

  it('reports failures with the server name and cause', () => {
    const error = new ConnectionError(
      'brave-search',
      new Error('spawn npx ENOENT')
    );
    expect(
      formatServerStatus({ name: 'brave-search', status: 'failed', error })
    ).toBe(
      "❌ Error connecting to server 'brave-search': spawn npx ENOENT"
    );
  });
});
