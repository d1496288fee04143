/**
 * Parser Tests: Type Annotations
 */

import { describe, expect, it } from 'vitest';
import type { TypeAnnotationNode } from '../../src/index.js';
import { failure, span, variable } from '../helpers/parse.js';

function annotation(type: string): TypeAnnotationNode {
  const { typeAnnotation } = variable(`let x: ${type} = 1`);
  if (typeAnnotation === null) {
    throw new Error(`Missing type annotation for: ${type}`);
  }
  return typeAnnotation;
}

describe('Parser: type annotations', () => {
  it('marks resource annotations', () => {
    expect(annotation('@R')).toEqual({
      type: 'TypeAnnotation',
      isResource: true,
      annotatedType: {
        type: 'NominalType',
        identifier: { name: 'R', span: span(8, 9) },
        nestedIdentifiers: [],
        span: span(8, 9),
      },
      span: span(7, 9),
    });
  });

  it('parses nested nominal types', () => {
    const { annotatedType } = annotation('A.B.C');
    expect(annotatedType).toMatchObject({
      type: 'NominalType',
      identifier: { name: 'A' },
      nestedIdentifiers: [{ name: 'B' }, { name: 'C' }],
      span: span(7, 12),
    });
  });

  it('parses variable-sized arrays', () => {
    expect(annotation('[Int]').annotatedType).toMatchObject({
      type: 'VariableSizedType',
      elementType: { type: 'NominalType', identifier: { name: 'Int' } },
      span: span(7, 12),
    });
  });

  it('parses dictionaries', () => {
    expect(annotation('{String: Int}').annotatedType).toMatchObject({
      type: 'DictionaryType',
      keyType: { identifier: { name: 'String' } },
      valueType: { identifier: { name: 'Int' } },
      span: span(7, 20),
    });
  });

  it('parses references', () => {
    expect(annotation('&R').annotatedType).toMatchObject({
      type: 'ReferenceType',
      referencedType: { identifier: { name: 'R' } },
      span: span(7, 9),
    });
  });

  it('parses optionals', () => {
    expect(annotation('Int?').annotatedType).toMatchObject({
      type: 'OptionalType',
      elementType: { type: 'NominalType' },
      span: span(7, 11),
    });
  });

  it('reads ?? as two optional layers', () => {
    expect(annotation('Int??').annotatedType).toMatchObject({
      type: 'OptionalType',
      elementType: {
        type: 'OptionalType',
        elementType: { type: 'NominalType' },
      },
    });
  });

  it('parses optional elements inside arrays', () => {
    expect(annotation('[Int?]').annotatedType).toMatchObject({
      type: 'VariableSizedType',
      elementType: { type: 'OptionalType', span: span(8, 12) },
      span: span(7, 13),
    });
  });

  it('rejects a missing type', () => {
    const err = failure('let x: = 1');
    expect(err.errorId).toBe('STRATA-P011');
    expect(err.message).toBe("unexpected token in type: got '=' at 1:8");
  });

  it('hints at an unclosed dictionary', () => {
    expect(failure('let x: {String: Int').message).toBe(
      "expected '}', got end of input at 1:20. Hint: Check for unclosed brace"
    );
  });
});
