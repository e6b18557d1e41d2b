import { describe, expect, it } from 'vitest';

import {
  createCollectingDiagnosticsPort,
  createNullDiagnosticsPort,
  type FormatDiagnostic,
} from './diagnostics.js';

const diagnostic: FormatDiagnostic = {
  code: 'NOVERB',
  message: 'directive has no verb',
  offset: 3,
  directive: '%',
};

describe('createNullDiagnosticsPort', () => {
  it('accepts events without side effects', () => {
    const port = createNullDiagnosticsPort();

    expect(() => port.emit(diagnostic)).not.toThrow();
  });
});

describe('createCollectingDiagnosticsPort', () => {
  it('records events in order and can be cleared', () => {
    const port = createCollectingDiagnosticsPort();

    port.emit(diagnostic);
    port.emit({ ...diagnostic, code: 'EXTRA', offset: 10 });

    expect(port.events.map((event) => event.code)).toEqual(['NOVERB', 'EXTRA']);

    port.clear();

    expect(port.events).toEqual([]);
  });
});
