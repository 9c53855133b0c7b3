import type { TextRange } from "./diagnostic.js";

export const enum AstNodeKind {
    Block,
    BinaryOp,
    NumberLiteral,
    BooleanLiteral,
    StringLiteral,
    Variable,
    Assignment,
    List,
    If,
    For,
    While,
    Print,
    FunctionCall,
}

export type ArithmeticOp = "+" | "-" | "*" | "/";
export type ComparisonOp = "==" | "!=" | "<" | ">" | "<=" | ">=";
export type BinaryOp = ArithmeticOp | ComparisonOp;

export interface BlockAstNode extends TextRange {
    readonly kind: AstNodeKind.Block;
    readonly statements: readonly AstNode[];
}

export interface BinaryOpAstNode extends TextRange {
    readonly kind: AstNodeKind.BinaryOp;
    readonly left: ExpressionAstNode;
    readonly op: BinaryOp;
    readonly right: ExpressionAstNode;
}

export interface NumberLiteralAstNode extends TextRange {
    readonly kind: AstNodeKind.NumberLiteral;
    // A bigint literal had no decimal point.
    readonly value: bigint | number;
}

export interface BooleanLiteralAstNode extends TextRange {
    readonly kind: AstNodeKind.BooleanLiteral;
    readonly value: boolean;
}

export interface StringLiteralAstNode extends TextRange {
    readonly kind: AstNodeKind.StringLiteral;
    readonly value: string;
}

export interface VariableAstNode extends TextRange {
    readonly kind: AstNodeKind.Variable;
    readonly name: string;
}

export interface AssignmentAstNode extends TextRange {
    readonly kind: AstNodeKind.Assignment;
    readonly target: VariableAstNode;
    readonly value: ExpressionAstNode;
}

export interface ListAstNode extends TextRange {
    readonly kind: AstNodeKind.List;
    readonly items: readonly ExpressionAstNode[];
}

export interface IfAstNode extends TextRange {
    readonly kind: AstNodeKind.If;
    readonly condition: ExpressionAstNode;
    readonly body: AstNode;
    readonly elseBody?: AstNode;
}

export interface ForAstNode extends TextRange {
    readonly kind: AstNodeKind.For;
    readonly iterator: VariableAstNode;
    // Half-open: the iterator takes rangeStart .. rangeEnd - 1.
    readonly rangeStart: ExpressionAstNode;
    readonly rangeEnd: ExpressionAstNode;
    readonly body: AstNode;
}

export interface WhileAstNode extends TextRange {
    readonly kind: AstNodeKind.While;
    readonly condition: ExpressionAstNode;
    readonly body: AstNode;
}

export interface PrintAstNode extends TextRange {
    readonly kind: AstNodeKind.Print;
    readonly expression: ExpressionAstNode;
}

export interface FunctionCallAstNode extends TextRange {
    readonly kind: AstNodeKind.FunctionCall;
    readonly name: VariableAstNode;
    readonly args: readonly ExpressionAstNode[];
}

export type ExpressionAstNode =
    | BinaryOpAstNode
    | NumberLiteralAstNode
    | BooleanLiteralAstNode
    | StringLiteralAstNode
    | VariableAstNode
    | ListAstNode
    | FunctionCallAstNode;

export type StatementAstNode =
    | BlockAstNode
    | AssignmentAstNode
    | IfAstNode
    | ForAstNode
    | WhileAstNode
    | PrintAstNode;

export type AstNode = ExpressionAstNode | StatementAstNode;

export const unreachableNode = (node: never): never => {
    throw new Error(`Unhandled AST node: ${String(node)}`);
};
