/**
 * Parser Extension: Type Annotations
 */

import { Parser } from './parser.js';
import type { Identifier, TypeAnnotationNode, TypeNode } from '../types.js';
import { TOKEN_TYPES, makeSpan } from '../types.js';
import {
  advance,
  check,
  current,
  describeToken,
  errorAt,
  expect,
} from './state.js';
import { tokenToIdentifier } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseTypeAnnotation(): TypeAnnotationNode;
    parseType(): TypeNode;
    parseNominalType(): TypeNode;
  }
}

/**
 * ```
 * typeAnnotation : '@'? type
 * ```
 * `@` marks the annotated type as a resource.
 */
Parser.prototype.parseTypeAnnotation = function (
  this: Parser
): TypeAnnotationNode {
  const start = current(this.state).span.start;
  const isResource = check(this.state, TOKEN_TYPES.AT);
  if (isResource) advance(this.state);

  const annotatedType = this.parseType();
  return {
    type: 'TypeAnnotation',
    isResource,
    annotatedType,
    span: makeSpan(start, annotatedType.span.end),
  };
};

/**
 * ```
 * type : ( nominal | '[' type ']' | '{' type ':' type '}' | '&' type ) '?'*
 * ```
 */
Parser.prototype.parseType = function (this: Parser): TypeNode {
  const token = current(this.state);
  let result: TypeNode;

  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      result = this.parseNominalType();
      break;

    case TOKEN_TYPES.LBRACKET: {
      advance(this.state);
      const elementType = this.parseType();
      const close = expect(this.state, TOKEN_TYPES.RBRACKET);
      result = {
        type: 'VariableSizedType',
        elementType,
        span: makeSpan(token.span.start, close.span.end),
      };
      break;
    }

    case TOKEN_TYPES.LBRACE: {
      advance(this.state);
      const keyType = this.parseType();
      expect(this.state, TOKEN_TYPES.COLON);
      const valueType = this.parseType();
      const close = expect(this.state, TOKEN_TYPES.RBRACE);
      result = {
        type: 'DictionaryType',
        keyType,
        valueType,
        span: makeSpan(token.span.start, close.span.end),
      };
      break;
    }

    case TOKEN_TYPES.AMPERSAND: {
      advance(this.state);
      const referencedType = this.parseType();
      result = {
        type: 'ReferenceType',
        referencedType,
        span: makeSpan(token.span.start, referencedType.span.end),
      };
      break;
    }

    default:
      throw errorAt(token, 'STRATA-P011', { actual: describeToken(token) });
  }

  // `??` lexes as one token but means two optional layers
  while (check(this.state, TOKEN_TYPES.QUESTION, TOKEN_TYPES.DOUBLE_QUESTION)) {
    const question = advance(this.state);
    const layers = question.type === TOKEN_TYPES.DOUBLE_QUESTION ? 2 : 1;
    for (let i = 0; i < layers; i++) {
      result = {
        type: 'OptionalType',
        elementType: result,
        span: makeSpan(result.span.start, question.span.end),
      };
    }
  }

  return result;
};

/** `A` or `A.B.C` */
Parser.prototype.parseNominalType = function (this: Parser): TypeNode {
  const first = tokenToIdentifier(advance(this.state));
  const nestedIdentifiers: Identifier[] = [];

  while (check(this.state, TOKEN_TYPES.DOT)) {
    advance(this.state);
    nestedIdentifiers.push(
      tokenToIdentifier(expect(this.state, TOKEN_TYPES.IDENTIFIER))
    );
  }

  const last = nestedIdentifiers[nestedIdentifiers.length - 1] ?? first;
  return {
    type: 'NominalType',
    identifier: first,
    nestedIdentifiers,
    span: makeSpan(first.span.start, last.span.end),
  };
};
