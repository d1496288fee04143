/**
 * Parser Tests: Import Declarations
 */

import { describe, expect, it } from 'vitest';
import {
  InternalError,
  decodeHexadecimalLocation,
} from '../../src/index.js';
import { failure, importDeclaration, span, thrownBy } from '../helpers/parse.js';

function address(source: string): number[] {
  const { location } = importDeclaration(source);
  if (location.type !== 'AddressLocation') {
    throw new Error(`Expected AddressLocation, got ${location.type}`);
  }
  return Array.from(location.address);
}

describe('Parser: import declarations', () => {
  describe('locations without identifiers', () => {
    it('imports a string location', () => {
      expect(importDeclaration('import "foo"')).toEqual({
        type: 'ImportDeclaration',
        identifiers: [],
        location: { type: 'StringLocation', value: 'foo' },
        span: span(0, 12),
        locationSpan: span(7, 12),
      });
    });

    it('imports an address location', () => {
      const declaration = importDeclaration('import 0x1');
      expect(declaration.identifiers).toEqual([]);
      expect(declaration.span).toEqual(span(0, 10));
      expect(declaration.locationSpan).toEqual(span(7, 10));
      expect(address('import 0x1')).toEqual([0x01]);
    });

    it('drops separators from addresses', () => {
      expect(address('import 0xA_B')).toEqual([0xab]);
    });

    it('decodes multi-byte addresses', () => {
      expect(address('import 0x0102_03')).toEqual([0x01, 0x02, 0x03]);
    });
  });

  describe('imported identifiers', () => {
    it('imports a list of identifiers', () => {
      expect(importDeclaration('import a, b from "x"')).toEqual({
        type: 'ImportDeclaration',
        identifiers: [
          { name: 'a', span: span(7, 8) },
          { name: 'b', span: span(10, 11) },
        ],
        location: { type: 'StringLocation', value: 'x' },
        span: span(0, 20),
        locationSpan: span(17, 20),
      });
    });

    it('imports a single identifier', () => {
      const declaration = importDeclaration('import a from "x"');
      expect(declaration.identifiers).toEqual([{ name: 'a', span: span(7, 8) }]);
      expect(declaration.span).toEqual(span(0, 17));
      expect(declaration.locationSpan).toEqual(span(14, 17));
    });

    it('imports identifiers from an address', () => {
      expect(address('import a, b, c from 0x0A')).toEqual([0x0a]);
    });

    it('ignores a preceding access modifier', () => {
      const declaration = importDeclaration('pub import "x"');
      expect(declaration.span).toEqual(span(4, 14));
    });
  });

  describe('identifier locations', () => {
    it('accept a lone identifier by default', () => {
      expect(importDeclaration('import a')).toEqual({
        type: 'ImportDeclaration',
        identifiers: [],
        location: { type: 'IdentifierLocation', identifier: 'a' },
        span: span(0, 8),
        locationSpan: span(7, 8),
      });
    });

    it('reject a lone identifier followed by a separator', () => {
      const err = failure('import a;');
      expect(err.errorId).toBe('STRATA-P007');
    });

    it('are rejected after from by default', () => {
      expect(failure('import a from B').message).toBe(
        'identifier import locations are not enabled: got identifier "B" at 1:15'
      );
    });

    it('parse a bare identifier when enabled', () => {
      expect(
        importDeclaration('import a', { identifierLocations: true })
      ).toEqual({
        type: 'ImportDeclaration',
        identifiers: [],
        location: { type: 'IdentifierLocation', identifier: 'a' },
        span: span(0, 8),
        locationSpan: span(7, 8),
      });
    });

    it('parse an identifier after from when enabled', () => {
      const declaration = importDeclaration('import a from B', {
        identifierLocations: true,
      });
      expect(declaration.identifiers.map((id) => id.name)).toEqual(['a']);
      expect(declaration.location).toEqual({
        type: 'IdentifierLocation',
        identifier: 'B',
      });
    });
  });

  describe('errors', () => {
    it('reports end of input after import', () => {
      const err = failure('import');
      expect(err.errorId).toBe('STRATA-P008');
      expect(err.message).toBe(
        'unexpected end in import declaration: expected string, address, or identifier at 1:7'
      );
    });

    it('rejects a non-location token after import', () => {
      expect(failure('import 1').message).toBe(
        'unexpected token in import declaration: got decimal integer 1, expected string, address, or identifier at 1:8'
      );
    });

    it('rejects a second identifier other than from', () => {
      const err = failure('import a b');
      expect(err.errorId).toBe('STRATA-P009');
      expect(err.message).toBe(
        'unexpected identifier in import declaration: got identifier "b", expected keyword "from" at 1:10'
      );
    });

    it('rejects other tokens after the first identifier', () => {
      expect(failure('import a = 1').message).toBe(
        'unexpected token in import declaration: got \'=\', expected keyword "from" or \',\' at 1:10'
      );
    });

    it('rejects a comma where an identifier is expected', () => {
      expect(failure('import a, , b from "x"').message).toBe(
        "unexpected token in import declaration: got ',', expected identifier at 1:11"
      );
    });

    it('rejects from where an identifier is expected', () => {
      expect(failure('import a, from "x"').message).toBe(
        'unexpected token in import declaration: got identifier "from", expected identifier at 1:11'
      );
    });

    it('rejects a missing comma in the list', () => {
      expect(failure('import a, b c').errorId).toBe('STRATA-P009');
    });

    it('reports end of input after a comma', () => {
      expect(failure('import a,').message).toBe(
        'unexpected end in import declaration: expected identifier at 1:10'
      );
    });

    it('reports end of input after a listed identifier', () => {
      expect(failure('import a, b').message).toBe(
        'unexpected end in import declaration: expected keyword "from" or \',\' at 1:12'
      );
    });

    it('rejects a non-location token after from', () => {
      expect(failure('import a from 1').message).toBe(
        'unexpected token in import declaration: got decimal integer 1, expected string, address, or identifier at 1:15'
      );
    });
  });
});

describe('decodeHexadecimalLocation', () => {
  const at = span(0, 0);

  it.each([
    ['0x1', [0x01]],
    ['0xA_B', [0xab]],
    ['0x0001', [0x00, 0x01]],
    ['0x123', [0x01, 0x23]],
    ['0x', []],
  ])('decodes %s', (literal, bytes) => {
    expect(Array.from(decodeHexadecimalLocation(literal, at).address)).toEqual(
      bytes
    );
  });

  it('reports undecodable text as an internal error', () => {
    const err = thrownBy(() => decodeHexadecimalLocation('0xZZ', at));
    expect(err).toBeInstanceOf(InternalError);
    expect(err).toMatchObject({
      errorId: 'STRATA-I002',
      message: 'invalid hexadecimal literal 0xZZ at 1:1',
    });
  });
});
