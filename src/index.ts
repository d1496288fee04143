/**
 * Strata Syntax
 * Exports lexer, declaration parser, AST types and error taxonomy
 */

export { LexerError, tokenize, type TokenizeOptions } from './lexer/index.js';
export {
  Parser,
  LOWEST_BINDING_POWER,
  decodeHexadecimalLocation,
  decodeStringLiteral,
  type DecodedString,
  parse,
  parseDeclarations,
} from './parser/index.js';
export type {
  DeclarationParseResult,
  ParserOptions,
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
  Keyword,
} from './types.js';
export {
  TOKEN_TYPES,
  KEYWORDS,
  keywordOf,
  lookupKeyword,
  formatLocation,
  spanText,
} from './types.js';

// ============================================================
// AST
// ============================================================
export type {
  Access,
  AddressLocation,
  ArgumentNode,
  ArrayExpressionNode,
  BinaryExpressionNode,
  BinaryOperation,
  BoolExpressionNode,
  CompositeDeclarationNode,
  CompositeKind,
  CreateExpressionNode,
  DeclarationNode,
  DestroyExpressionNode,
  DictionaryTypeNode,
  ExpressionNode,
  ExpressionStatementNode,
  FunctionBlockNode,
  FunctionDeclarationNode,
  Identifier,
  IdentifierExpressionNode,
  IdentifierLocation,
  ImportDeclarationNode,
  IndexExpressionNode,
  IntegerBase,
  IntegerExpressionNode,
  InvocationExpressionNode,
  Location,
  MemberExpressionNode,
  MembersNode,
  NilExpressionNode,
  NominalTypeNode,
  OptionalTypeNode,
  ParameterListNode,
  ParameterNode,
  ReferenceTypeNode,
  ReturnStatementNode,
  SecondTransferNode,
  SpecialFunctionDeclarationNode,
  SpecialFunctionKind,
  StatementNode,
  StringExpressionNode,
  StringLocation,
  Transfer,
  TransferOperation,
  TypeAnnotationNode,
  TypeNode,
  UnaryExpressionNode,
  UnaryOperation,
  VariableDeclarationNode,
  VariableSizedTypeNode,
} from './types.js';
export { ACCESS, TRANSFER_OPERATIONS } from './types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type Diagnostic,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorSeverity,
  type StrataErrorData,
  ERROR_REGISTRY,
  renderMessage,
  createError,
  createDiagnostic,
  StrataError,
  ParseError,
  InternalError,
} from './types.js';
