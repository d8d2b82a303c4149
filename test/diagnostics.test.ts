import { describe, expect, it } from 'vitest';

import { DiagnosticIds, diagnosticCategory, hasErrors } from '../src/diagnostics/types.js';

describe('diagnostics', () => {
  it('tells bad input apart from missing features', () => {
    expect(diagnosticCategory(DiagnosticIds.DecodeError)).toBe('input');
    expect(diagnosticCategory(DiagnosticIds.UnresolvedToken)).toBe('input');
    expect(diagnosticCategory(DiagnosticIds.UnsupportedInstruction)).toBe('unsupported');
    expect(diagnosticCategory(DiagnosticIds.DuplicateLabel)).toBe('link');
    expect(diagnosticCategory(DiagnosticIds.NotFound)).toBe('config');
    expect(diagnosticCategory(DiagnosticIds.Internal)).toBe('internal');
  });

  it('gates on errors only', () => {
    const warning = { id: DiagnosticIds.Unknown, severity: 'warning' as const, message: 'w', file: 'f' };
    expect(hasErrors([])).toBe(false);
    expect(hasErrors([warning])).toBe(false);
    expect(hasErrors([warning, { ...warning, severity: 'error' }])).toBe(true);
  });
});
