/**
 * Error Taxonomy Tests
 * Registry contents, template rendering and error class categories
 */

import { describe, expect, it } from 'vitest';
import {
  ERROR_REGISTRY,
  InternalError,
  LexerError,
  ParseError,
  StrataError,
  createDiagnostic,
  createError,
  parse,
  parseDeclarations,
  renderMessage,
} from '../../src/index.js';
import { span, thrownBy } from '../helpers/parse.js';

const LOCATION = { line: 2, column: 3, offset: 9 };

const PREFIX_BY_CATEGORY = {
  lexer: 'L',
  parse: 'P',
  internal: 'I',
  literal: 'W',
} as const;

describe('ERROR_REGISTRY', () => {
  it('uses the category letter in every error ID', () => {
    for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
      expect(errorId).toMatch(/^STRATA-[LPIW]\d{3}$/);
      expect(errorId.charAt(7)).toBe(PREFIX_BY_CATEGORY[definition.category]);
    }
  });

  it('marks literal diagnostics as warnings', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      if (definition.category === 'literal') {
        expect(definition.severity).toBe('warning');
      }
    }
  });

  it('looks up definitions by ID', () => {
    expect(ERROR_REGISTRY.get('STRATA-P006')).toMatchObject({
      category: 'parse',
      messageTemplate: 'expected transfer, got {actual}',
    });
    expect(ERROR_REGISTRY.has('STRATA-X999')).toBe(false);
  });
});

describe('renderMessage', () => {
  it('fills placeholders', () => {
    expect(
      renderMessage('expected {expected}, got {actual}', {
        expected: "')'",
        actual: 'end of input',
      })
    ).toBe("expected ')', got end of input");
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('got {actual}.', {})).toBe('got .');
  });

  it('returns a template with an unclosed brace unchanged', () => {
    expect(renderMessage('got {actual', { actual: 'x' })).toBe('got {actual');
  });
});

describe('createError', () => {
  it('creates the class matching the category', () => {
    expect(createError('STRATA-L002', { char: '$' }, LOCATION)).toBeInstanceOf(
      LexerError
    );
    expect(createError('STRATA-P001', {}, LOCATION)).toBeInstanceOf(ParseError);
    expect(
      createError('STRATA-I001', { detail: 'x' }, LOCATION)
    ).toBeInstanceOf(InternalError);
  });

  it('suffixes the message with the location', () => {
    const err = createError('STRATA-P006', { actual: "'('" }, LOCATION);
    expect(err.message).toBe("expected transfer, got '(' at 2:3");
    expect(err.toData()).toEqual({
      errorId: 'STRATA-P006',
      message: "expected transfer, got '('",
      location: LOCATION,
      context: { actual: "'('" },
    });
  });

  it('formats through a host formatter', () => {
    const err = createError('STRATA-P001', {}, LOCATION);
    expect(err.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      '[STRATA-P001] unexpected access modifier'
    );
    expect(err.format()).toBe('unexpected access modifier at 2:3');
  });

  it('refuses literal diagnostic IDs', () => {
    expect(() => createError('STRATA-W001', {}, LOCATION)).toThrow(
      'Error ID STRATA-W001 is a diagnostic, not an error'
    );
  });

  it('refuses unknown IDs', () => {
    expect(() => createError('STRATA-P999', {}, LOCATION)).toThrow(
      'Unknown error ID: STRATA-P999'
    );
  });
});

describe('error classes', () => {
  it('validate the category of their ID', () => {
    expect(() => new ParseError('STRATA-L001', 'x', LOCATION)).toThrow(
      'Expected parse error ID, got: STRATA-L001'
    );
    expect(() => new InternalError('STRATA-P001', 'x')).toThrow(TypeError);
  });

  it('render a hint after the location', () => {
    const err = new ParseError(
      'STRATA-P004',
      "expected ')', got end of input",
      LOCATION,
      {},
      'Check for unclosed parenthesis'
    );
    expect(err.message).toBe(
      "expected ')', got end of input at 2:3. Hint: Check for unclosed parenthesis"
    );
    expect(err.toData()).toEqual({
      errorId: 'STRATA-P004',
      message: "expected ')', got end of input",
      location: LOCATION,
      context: {},
      hint: 'Check for unclosed parenthesis',
    });
  });

  it('allow internal errors without a location', () => {
    const err = new InternalError('STRATA-I001', 'unreachable code reached: x');
    expect(err.message).toBe('unreachable code reached: x');
    expect(err.location).toBeUndefined();
  });
});

describe('createDiagnostic', () => {
  it('creates a warning with its span', () => {
    expect(
      createDiagnostic('STRATA-W002', { character: 'q' }, span(1, 3))
    ).toEqual({
      errorId: 'STRATA-W002',
      severity: 'warning',
      message: 'invalid escape character q',
      span: span(1, 3),
    });
  });

  it('refuses fatal error IDs', () => {
    expect(() => createDiagnostic('STRATA-P001', {}, span(0, 0))).toThrow(
      'Expected literal error ID, got: STRATA-P001'
    );
  });
});

describe('parse entry points', () => {
  it('report lexer errors through the result', () => {
    const result = parseDeclarations('let x = $');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(LexerError);
      expect(result.error.errorId).toBe('STRATA-L002');
      expect(result.diagnostics).toEqual([]);
    }
  });

  it('return no declarations on failure', () => {
    const result = parseDeclarations('let a = 1 let');
    expect(result).not.toHaveProperty('declarations');
  });

  it('throw from parse', () => {
    const err = thrownBy(() => parse('let x'));
    expect(err).toBeInstanceOf(StrataError);
    expect(err).toBeInstanceOf(ParseError);
  });

  it('return declarations from parse', () => {
    expect(parse('let x = 1')).toHaveLength(1);
  });
});
