/**
 * Strata AST Types
 * Declarations, expressions, types and import locations
 */

import type { SourceSpan } from './source-location.js';

// ============================================================
// ACCESS AND TRANSFER
// ============================================================

export const ACCESS = {
  NOT_SPECIFIED: 'NotSpecified',
  PRIVATE: 'Private',
  PUBLIC: 'Public',
  PUBLIC_SETTABLE: 'PublicSettable',
  ACCOUNT: 'Account',
  CONTRACT: 'Contract',
} as const;

export type Access = (typeof ACCESS)[keyof typeof ACCESS];

/**
 * Resource-transfer operations.
 * - Copy (`=`): duplicates the value
 * - Move (`<-`): moves a resource out of the source expression
 * - MoveForced (`<-!`): move into a destination asserted to be empty
 */
export const TRANSFER_OPERATIONS = {
  COPY: 'Copy',
  MOVE: 'Move',
  MOVE_FORCED: 'MoveForced',
} as const;

export type TransferOperation =
  (typeof TRANSFER_OPERATIONS)[keyof typeof TRANSFER_OPERATIONS];

export interface Transfer {
  readonly operation: TransferOperation;
  readonly span: SourceSpan;
}

export interface Identifier {
  readonly name: string;
  readonly span: SourceSpan;
}

// ============================================================
// TYPES
// ============================================================

export interface NominalTypeNode {
  readonly type: 'NominalType';
  readonly identifier: Identifier;
  /** `A.B.C` stores `B` and `C` here */
  readonly nestedIdentifiers: Identifier[];
  readonly span: SourceSpan;
}

export interface OptionalTypeNode {
  readonly type: 'OptionalType';
  readonly elementType: TypeNode;
  readonly span: SourceSpan;
}

export interface VariableSizedTypeNode {
  readonly type: 'VariableSizedType';
  readonly elementType: TypeNode;
  readonly span: SourceSpan;
}

export interface DictionaryTypeNode {
  readonly type: 'DictionaryType';
  readonly keyType: TypeNode;
  readonly valueType: TypeNode;
  readonly span: SourceSpan;
}

export interface ReferenceTypeNode {
  readonly type: 'ReferenceType';
  readonly referencedType: TypeNode;
  readonly span: SourceSpan;
}

export type TypeNode =
  | NominalTypeNode
  | OptionalTypeNode
  | VariableSizedTypeNode
  | DictionaryTypeNode
  | ReferenceTypeNode;

export interface TypeAnnotationNode {
  readonly type: 'TypeAnnotation';
  /** Annotation was prefixed with `@` */
  readonly isResource: boolean;
  readonly annotatedType: TypeNode;
  readonly span: SourceSpan;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type IntegerBase = 2 | 8 | 10 | 16;

export interface IntegerExpressionNode {
  readonly type: 'IntegerExpression';
  readonly value: bigint;
  readonly base: IntegerBase;
  /** Literal text as written, including prefix and separators */
  readonly literal: string;
  readonly span: SourceSpan;
}

export interface StringExpressionNode {
  readonly type: 'StringExpression';
  readonly value: string;
  readonly span: SourceSpan;
}

export interface BoolExpressionNode {
  readonly type: 'BoolExpression';
  readonly value: boolean;
  readonly span: SourceSpan;
}

export interface NilExpressionNode {
  readonly type: 'NilExpression';
  readonly span: SourceSpan;
}

export interface IdentifierExpressionNode {
  readonly type: 'IdentifierExpression';
  readonly identifier: Identifier;
  readonly span: SourceSpan;
}

export interface ArrayExpressionNode {
  readonly type: 'ArrayExpression';
  readonly values: ExpressionNode[];
  readonly span: SourceSpan;
}

export type UnaryOperation = '-' | '!' | '<-';

export interface UnaryExpressionNode {
  readonly type: 'UnaryExpression';
  readonly operation: UnaryOperation;
  readonly expression: ExpressionNode;
  readonly span: SourceSpan;
}

export type BinaryOperation =
  | '??'
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export interface BinaryExpressionNode {
  readonly type: 'BinaryExpression';
  readonly operation: BinaryOperation;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
  readonly span: SourceSpan;
}

export interface ArgumentNode {
  readonly type: 'Argument';
  readonly label: Identifier | null;
  readonly expression: ExpressionNode;
  readonly span: SourceSpan;
}

export interface InvocationExpressionNode {
  readonly type: 'InvocationExpression';
  readonly invokedExpression: ExpressionNode;
  readonly arguments: ArgumentNode[];
  readonly span: SourceSpan;
}

export interface MemberExpressionNode {
  readonly type: 'MemberExpression';
  readonly expression: ExpressionNode;
  readonly identifier: Identifier;
  readonly span: SourceSpan;
}

export interface IndexExpressionNode {
  readonly type: 'IndexExpression';
  readonly targetExpression: ExpressionNode;
  readonly indexingExpression: ExpressionNode;
  readonly span: SourceSpan;
}

export interface CreateExpressionNode {
  readonly type: 'CreateExpression';
  readonly invocation: InvocationExpressionNode;
  readonly span: SourceSpan;
}

export interface DestroyExpressionNode {
  readonly type: 'DestroyExpression';
  readonly expression: ExpressionNode;
  readonly span: SourceSpan;
}

export type ExpressionNode =
  | IntegerExpressionNode
  | StringExpressionNode
  | BoolExpressionNode
  | NilExpressionNode
  | IdentifierExpressionNode
  | ArrayExpressionNode
  | UnaryExpressionNode
  | BinaryExpressionNode
  | InvocationExpressionNode
  | MemberExpressionNode
  | IndexExpressionNode
  | CreateExpressionNode
  | DestroyExpressionNode;

// ============================================================
// PARAMETERS AND FUNCTION BODIES
// ============================================================

export interface ParameterNode {
  readonly type: 'Parameter';
  /** Argument label, when one is written before the parameter name */
  readonly label: Identifier | null;
  readonly identifier: Identifier;
  readonly typeAnnotation: TypeAnnotationNode;
  readonly span: SourceSpan;
}

export interface ParameterListNode {
  readonly type: 'ParameterList';
  readonly parameters: ParameterNode[];
  readonly span: SourceSpan;
}

export interface ReturnStatementNode {
  readonly type: 'ReturnStatement';
  readonly expression: ExpressionNode | null;
  readonly span: SourceSpan;
}

export interface ExpressionStatementNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
  readonly span: SourceSpan;
}

export type StatementNode =
  | ReturnStatementNode
  | ExpressionStatementNode
  | VariableDeclarationNode
  | FunctionDeclarationNode;

export interface FunctionBlockNode {
  readonly type: 'FunctionBlock';
  readonly statements: StatementNode[];
  readonly span: SourceSpan;
}

// ============================================================
// IMPORT LOCATIONS
// ============================================================

export interface StringLocation {
  readonly type: 'StringLocation';
  readonly value: string;
}

export interface AddressLocation {
  readonly type: 'AddressLocation';
  readonly address: Uint8Array;
}

export interface IdentifierLocation {
  readonly type: 'IdentifierLocation';
  readonly identifier: string;
}

export type Location = StringLocation | AddressLocation | IdentifierLocation;

// ============================================================
// DECLARATIONS
// ============================================================

/** Second `transfer expression` pair of a variable declaration */
export interface SecondTransferNode {
  readonly transfer: Transfer;
  readonly value: ExpressionNode;
}

export interface VariableDeclarationNode {
  readonly type: 'VariableDeclaration';
  readonly access: Access;
  /** `let` declares a constant, `var` a variable */
  readonly isConstant: boolean;
  readonly identifier: Identifier;
  readonly typeAnnotation: TypeAnnotationNode | null;
  readonly transfer: Transfer;
  readonly value: ExpressionNode;
  readonly second: SecondTransferNode | null;
  readonly span: SourceSpan;
}

export interface ImportDeclarationNode {
  readonly type: 'ImportDeclaration';
  readonly identifiers: Identifier[];
  readonly location: Location;
  readonly span: SourceSpan;
  readonly locationSpan: SourceSpan;
}

export type CompositeKind = 'Event';

export type SpecialFunctionKind = 'Initializer';

export interface SpecialFunctionDeclarationNode {
  readonly type: 'SpecialFunctionDeclaration';
  readonly declarationKind: SpecialFunctionKind;
  readonly parameterList: ParameterListNode;
  readonly functionBlock: FunctionBlockNode | null;
  readonly span: SourceSpan;
}

export interface MembersNode {
  readonly specialFunctions: SpecialFunctionDeclarationNode[];
}

export interface CompositeDeclarationNode {
  readonly type: 'CompositeDeclaration';
  readonly access: Access;
  readonly compositeKind: CompositeKind;
  readonly identifier: Identifier;
  readonly members: MembersNode;
  readonly span: SourceSpan;
}

export interface FunctionDeclarationNode {
  readonly type: 'FunctionDeclaration';
  readonly access: Access;
  readonly identifier: Identifier;
  readonly parameterList: ParameterListNode;
  readonly returnTypeAnnotation: TypeAnnotationNode | null;
  readonly functionBlock: FunctionBlockNode | null;
  readonly span: SourceSpan;
}

export type DeclarationNode =
  | VariableDeclarationNode
  | ImportDeclarationNode
  | CompositeDeclarationNode
  | FunctionDeclarationNode;
