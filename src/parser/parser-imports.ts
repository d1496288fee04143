/**
 * Parser Extension: Import Declarations
 * Imported names, locations and address decoding
 */

import { Parser } from './parser.js';
import type {
  AddressLocation,
  Identifier,
  ImportDeclarationNode,
  Location,
  SourceSpan,
  Token,
} from '../types.js';
import { KEYWORDS, TOKEN_TYPES, createError, keywordOf, makeSpan } from '../types.js';
import { advance, current, describeToken, errorAt, report } from './state.js';
import { tokenToIdentifier } from './helpers.js';
import { decodeStringLiteral } from './parser-literals.js';

declare module './parser.js' {
  interface Parser {
    parseImportDeclaration(): ImportDeclarationNode;
    parseImportIdentifierList(first: Identifier): Identifier[];
    parseImportLocation(): Token;
    parseLiteralLocation(token: Token): Location;
  }
}

const LOCATION_KINDS = 'string, address, or identifier';
const COMMA_OR_FROM = 'keyword "from" or \',\'';

// ============================================================
// IMPORT DECLARATION
// ============================================================

/**
 * Parse an import declaration.
 *
 * ```
 * importDeclaration :
 *     'import'
 *     ( identifier (',' identifier)* 'from' )?
 *     ( string | hexadecimalLiteral | identifier )
 * ```
 *
 * The grammar is ambiguous after the first identifier: it is either the
 * first imported name or, with nothing following, the location itself.
 */
Parser.prototype.parseImportDeclaration = function (
  this: Parser
): ImportDeclarationNode {
  const importToken = advance(this.state);

  let identifiers: Identifier[] = [];
  let locationToken: Token;

  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.HEXADECIMAL:
      locationToken = advance(this.state);
      break;

    case TOKEN_TYPES.IDENTIFIER: {
      const first = tokenToIdentifier(advance(this.state));
      const next = current(this.state);

      if (next.type === TOKEN_TYPES.COMMA) {
        identifiers = this.parseImportIdentifierList(first);
        locationToken = this.parseImportLocation();
      } else if (next.type === TOKEN_TYPES.IDENTIFIER) {
        if (keywordOf(next) !== KEYWORDS.FROM) {
          throw errorAt(next, 'STRATA-P009', { actual: describeToken(next) });
        }
        advance(this.state);
        identifiers = [first];
        locationToken = this.parseImportLocation();
      } else if (next.type === TOKEN_TYPES.EOF) {
        // Nothing follows: the identifier is the location itself
        locationToken = token;
      } else {
        throw errorAt(next, 'STRATA-P007', {
          actual: describeToken(next),
          expected: COMMA_OR_FROM,
        });
      }
      break;
    }

    case TOKEN_TYPES.EOF:
      throw errorAt(token, 'STRATA-P008', { expected: LOCATION_KINDS });

    default:
      throw errorAt(token, 'STRATA-P007', {
        actual: describeToken(token),
        expected: LOCATION_KINDS,
      });
  }

  return {
    type: 'ImportDeclaration',
    identifiers,
    location: this.parseLiteralLocation(locationToken),
    span: makeSpan(importToken.span.start, locationToken.span.end),
    locationSpan: locationToken.span,
  };
};

/**
 * Parse `, b, c from` after the first imported name, alternating between
 * expecting an identifier and expecting a comma or `from`. Consumes `from`.
 */
Parser.prototype.parseImportIdentifierList = function (
  this: Parser,
  first: Identifier
): Identifier[] {
  const identifiers: Identifier[] = [first];
  let expectCommaOrFrom = true;

  while (true) {
    const token = current(this.state);

    switch (token.type) {
      case TOKEN_TYPES.COMMA:
        if (!expectCommaOrFrom) {
          throw errorAt(token, 'STRATA-P007', {
            actual: describeToken(token),
            expected: 'identifier',
          });
        }
        advance(this.state);
        expectCommaOrFrom = false;
        break;

      case TOKEN_TYPES.IDENTIFIER:
        if (expectCommaOrFrom) {
          if (keywordOf(token) !== KEYWORDS.FROM) {
            throw errorAt(token, 'STRATA-P009', {
              actual: describeToken(token),
            });
          }
          advance(this.state);
          return identifiers;
        }
        if (keywordOf(token) === KEYWORDS.FROM) {
          throw errorAt(token, 'STRATA-P007', {
            actual: describeToken(token),
            expected: 'identifier',
          });
        }
        identifiers.push(tokenToIdentifier(advance(this.state)));
        expectCommaOrFrom = true;
        break;

      case TOKEN_TYPES.EOF:
        throw errorAt(token, 'STRATA-P008', {
          expected: expectCommaOrFrom ? COMMA_OR_FROM : 'identifier',
        });

      default:
        throw errorAt(token, 'STRATA-P007', {
          actual: describeToken(token),
          expected: expectCommaOrFrom ? COMMA_OR_FROM : 'identifier',
        });
    }
  }
};

// ============================================================
// LOCATIONS
// ============================================================

/**
 * Consume the location token that follows `from`. Identifiers are only
 * accepted here when identifier locations are enabled.
 */
Parser.prototype.parseImportLocation = function (this: Parser): Token {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.HEXADECIMAL:
      return advance(this.state);

    case TOKEN_TYPES.IDENTIFIER:
      if (!this.state.identifierLocations) {
        throw errorAt(token, 'STRATA-P013', { actual: describeToken(token) });
      }
      return advance(this.state);

    case TOKEN_TYPES.EOF:
      throw errorAt(token, 'STRATA-P008', { expected: LOCATION_KINDS });

    default:
      throw errorAt(token, 'STRATA-P007', {
        actual: describeToken(token),
        expected: LOCATION_KINDS,
      });
  }
};

/**
 * Turn a location token into a Location. String diagnostics are recorded
 * on the parser state.
 */
Parser.prototype.parseLiteralLocation = function (
  this: Parser,
  token: Token
): Location {
  switch (token.type) {
    case TOKEN_TYPES.STRING: {
      const { value, diagnostics } = decodeStringLiteral(token.value, token.span);
      report(this.state, diagnostics);
      return { type: 'StringLocation', value };
    }

    case TOKEN_TYPES.HEXADECIMAL:
      return decodeHexadecimalLocation(token.value, token.span);

    case TOKEN_TYPES.IDENTIFIER:
      return { type: 'IdentifierLocation', identifier: token.value };

    default:
      throw errorAt(token, 'STRATA-I001', {
        detail: `import location from ${describeToken(token)}`,
      });
  }
};

// ============================================================
// ADDRESS DECODING
// ============================================================

const HEX_PAIRS = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Decode a hexadecimal literal such as `0x0A_bc` into address bytes.
 *
 * Separators are dropped and an odd digit count gets one leading zero, so
 * `0x1` decodes to `[0x01]`. Text the lexer could not have produced as a
 * hexadecimal token raises STRATA-I002.
 */
export function decodeHexadecimalLocation(
  literal: string,
  span: SourceSpan
): AddressLocation {
  let digits = literal.slice(2).replace(/_/g, '');
  if (digits.length % 2 === 1) {
    digits = `0${digits}`;
  }

  if (!/^0[xX]/.test(literal) || !HEX_PAIRS.test(digits)) {
    throw createError('STRATA-I002', { literal }, span.start);
  }

  const address = new Uint8Array(digits.length / 2);
  for (let i = 0; i < address.length; i++) {
    address[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }

  return { type: 'AddressLocation', address };
}
