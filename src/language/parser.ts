import {
    type ArithmeticOp,
    type AstNode,
    AstNodeKind,
    type BinaryOpAstNode,
    type BlockAstNode,
    type ComparisonOp,
    type ExpressionAstNode,
    type ForAstNode,
    type FunctionCallAstNode,
    type IfAstNode,
    type ListAstNode,
    type PrintAstNode,
    type VariableAstNode,
    type WhileAstNode,
} from "./ast.js";
import type { Diagnostic } from "./diagnostic.js";
import { type IdentifierToken, type Token, TokenKind } from "./tokenizer.js";

interface ParserState {
    tokens: Token[];
    index: number;
    errors: Diagnostic[];
}

const additiveOps: ReadonlyMap<TokenKind, ArithmeticOp> = new Map<TokenKind, ArithmeticOp>([
    [TokenKind.Plus, "+"],
    [TokenKind.Minus, "-"],
]);

const multiplicativeOps: ReadonlyMap<TokenKind, ArithmeticOp> = new Map<TokenKind, ArithmeticOp>([
    [TokenKind.Times, "*"],
    [TokenKind.Divide, "/"],
]);

const comparisonOps: ReadonlyMap<TokenKind, ComparisonOp> = new Map<TokenKind, ComparisonOp>([
    [TokenKind.Equals, "=="],
    [TokenKind.NotEquals, "!="],
    [TokenKind.LessThan, "<"],
    [TokenKind.GreaterThan, ">"],
    [TokenKind.LessThanOrEqual, "<="],
    [TokenKind.GreaterThanOrEqual, ">="],
]);

const getToken = (state: ParserState, offset = 0): Token => {
    const index = Math.min(state.index + offset, state.tokens.length - 1);

    return state.tokens[index];
};

const nextToken = (state: ParserState): Token => {
    const token = getToken(state);

    if (token.kind !== TokenKind.EndOfInput) {
        state.index += 1;
    }

    return token;
};

const isTokenKind = <K extends TokenKind>(token: Token, kind: K): token is Token & { kind: K } =>
    token.kind === kind;

const matchToken = <K extends TokenKind>(
    state: ParserState,
    kind: K,
): (Token & { kind: K }) | undefined => {
    const token = getToken(state);

    if (!isTokenKind(token, kind)) {
        return;
    }

    nextToken(state);

    return token;
};

const reportError = (state: ParserState) => {
    const token = getToken(state);

    if (token.kind === TokenKind.EndOfInput) {
        state.errors.push({
            kind: "SyntaxError",
            message: "Syntax error at end of input",
            line: token.start.line,
            column: token.start.column,
        });

        return;
    }

    state.errors.push({
        kind: "SyntaxError",
        message: `Syntax error at line ${token.start.line}, token='${token.text}' (type='${token.kind}')`,
        line: token.start.line,
        column: token.start.column,
        token: {
            text: token.text,
            kind: token.kind,
        },
    });
};

const expectToken = <K extends TokenKind>(
    state: ParserState,
    kind: K,
): (Token & { kind: K }) | undefined => {
    const token = matchToken(state, kind);

    if (!token) {
        reportError(state);
    }

    return token;
};

const makeVariable = (token: IdentifierToken): VariableAstNode => ({
    kind: AstNodeKind.Variable,
    name: token.text,
    start: token.start,
    end: token.end,
});

const makeBlock = (statements: AstNode[]): BlockAstNode => ({
    kind: AstNodeKind.Block,
    statements,
    start: statements[0].start,
    end: statements[statements.length - 1].end,
});

const parseArgumentList = (
    state: ParserState,
    close: TokenKind,
): ExpressionAstNode[] | undefined => {
    const args: ExpressionAstNode[] = [];

    if (getToken(state).kind === close) {
        return args;
    }

    do {
        const arg = parseExpression(state);

        if (!arg) {
            return;
        }

        args.push(arg);
    } while (matchToken(state, TokenKind.Comma));

    return args;
};

const parseFunctionCall = (
    state: ParserState,
    nameToken: IdentifierToken,
): FunctionCallAstNode | undefined => {
    if (!expectToken(state, TokenKind.LeftParen)) {
        return;
    }

    const args = parseArgumentList(state, TokenKind.RightParen);

    if (!args) {
        return;
    }

    const close = expectToken(state, TokenKind.RightParen);

    if (!close) {
        return;
    }

    return {
        kind: AstNodeKind.FunctionCall,
        name: makeVariable(nameToken),
        args,
        start: nameToken.start,
        end: close.end,
    };
};

const parseFactor = (state: ParserState): ExpressionAstNode | undefined => {
    const token = getToken(state);

    switch (token.kind) {
        case TokenKind.Number:
            nextToken(state);

            return {
                kind: AstNodeKind.NumberLiteral,
                value: token.value,
                start: token.start,
                end: token.end,
            };
        case TokenKind.String:
            nextToken(state);

            return {
                kind: AstNodeKind.StringLiteral,
                value: token.value,
                start: token.start,
                end: token.end,
            };
        case TokenKind.True:
        case TokenKind.False:
            nextToken(state);

            return {
                kind: AstNodeKind.BooleanLiteral,
                value: token.kind === TokenKind.True,
                start: token.start,
                end: token.end,
            };
        case TokenKind.Identifier:
            nextToken(state);

            if (getToken(state).kind === TokenKind.LeftParen) {
                return parseFunctionCall(state, token);
            }

            return makeVariable(token);
        case TokenKind.LeftParen: {
            nextToken(state);

            const expression = parseExpression(state);

            if (!expression || !expectToken(state, TokenKind.RightParen)) {
                return;
            }

            return expression;
        }
        default:
            reportError(state);
            return;
    }
};

const parseBinaryLevel = (
    state: ParserState,
    ops: ReadonlyMap<TokenKind, ArithmeticOp>,
    parseOperand: (state: ParserState) => ExpressionAstNode | undefined,
): ExpressionAstNode | undefined => {
    let left = parseOperand(state);

    if (!left) {
        return;
    }

    while (true) {
        const op = ops.get(getToken(state).kind);

        if (op === undefined) {
            return left;
        }

        nextToken(state);

        const right = parseOperand(state);

        if (!right) {
            return;
        }

        const node: BinaryOpAstNode = {
            kind: AstNodeKind.BinaryOp,
            left,
            op,
            right,
            start: left.start,
            end: right.end,
        };

        left = node;
    }
};

const parseTerm = (state: ParserState) => parseBinaryLevel(state, multiplicativeOps, parseFactor);

const parseExpression = (state: ParserState) => parseBinaryLevel(state, additiveOps, parseTerm);

const parseCondition = (state: ParserState): BinaryOpAstNode | undefined => {
    const left = parseExpression(state);

    if (!left) {
        return;
    }

    const op = comparisonOps.get(getToken(state).kind);

    if (op === undefined) {
        reportError(state);
        return;
    }

    nextToken(state);

    const right = parseExpression(state);

    if (!right) {
        return;
    }

    return {
        kind: AstNodeKind.BinaryOp,
        left,
        op,
        right,
        start: left.start,
        end: right.end,
    };
};

const parseListLiteral = (state: ParserState): ListAstNode | undefined => {
    const open = expectToken(state, TokenKind.LeftBracket);

    if (!open) {
        return;
    }

    const items = parseArgumentList(state, TokenKind.RightBracket);

    if (!items) {
        return;
    }

    const close = expectToken(state, TokenKind.RightBracket);

    if (!close) {
        return;
    }

    return {
        kind: AstNodeKind.List,
        items,
        start: open.start,
        end: close.end,
    };
};

const parseAssignment = (state: ParserState, nameToken: IdentifierToken): AstNode | undefined => {
    if (!expectToken(state, TokenKind.Assign)) {
        return;
    }

    const value =
        getToken(state).kind === TokenKind.LeftBracket
            ? parseListLiteral(state)
            : parseExpression(state);

    if (!value) {
        return;
    }

    return {
        kind: AstNodeKind.Assignment,
        target: makeVariable(nameToken),
        value,
        start: nameToken.start,
        end: value.end,
    };
};

// A body runs to the end of its ";"-joined sequence, so it also takes any
// statements that follow it in the enclosing sequence.
const parseBody = (state: ParserState): AstNode | undefined => {
    const statements = parseSequence(state);

    if (!statements) {
        return;
    }

    return statements.length === 1 ? statements[0] : makeBlock(statements);
};

const parseIf = (state: ParserState): IfAstNode | undefined => {
    const ifToken = nextToken(state);
    const condition = parseCondition(state);

    if (!condition || !expectToken(state, TokenKind.Colon)) {
        return;
    }

    const body = parseBody(state);

    if (!body) {
        return;
    }

    if (!matchToken(state, TokenKind.Else)) {
        return {
            kind: AstNodeKind.If,
            condition,
            body,
            start: ifToken.start,
            end: body.end,
        };
    }

    if (!expectToken(state, TokenKind.Colon)) {
        return;
    }

    const elseBody = parseBody(state);

    if (!elseBody) {
        return;
    }

    return {
        kind: AstNodeKind.If,
        condition,
        body,
        elseBody,
        start: ifToken.start,
        end: elseBody.end,
    };
};

const parseFor = (state: ParserState): ForAstNode | undefined => {
    const forToken = nextToken(state);
    const iterator = expectToken(state, TokenKind.Identifier);

    if (
        !iterator ||
        !expectToken(state, TokenKind.In) ||
        !expectToken(state, TokenKind.Range) ||
        !expectToken(state, TokenKind.LeftParen)
    ) {
        return;
    }

    const rangeStart = parseExpression(state);

    if (!rangeStart || !expectToken(state, TokenKind.Comma)) {
        return;
    }

    const rangeEnd = parseExpression(state);

    if (
        !rangeEnd ||
        !expectToken(state, TokenKind.RightParen) ||
        !expectToken(state, TokenKind.Colon)
    ) {
        return;
    }

    const body = parseBody(state);

    if (!body) {
        return;
    }

    return {
        kind: AstNodeKind.For,
        iterator: makeVariable(iterator),
        rangeStart,
        rangeEnd,
        body,
        start: forToken.start,
        end: body.end,
    };
};

const parseWhile = (state: ParserState): WhileAstNode | undefined => {
    const whileToken = nextToken(state);
    const condition = parseCondition(state);

    if (!condition || !expectToken(state, TokenKind.Colon)) {
        return;
    }

    const body = parseBody(state);

    if (!body) {
        return;
    }

    return {
        kind: AstNodeKind.While,
        condition,
        body,
        start: whileToken.start,
        end: body.end,
    };
};

const parsePrint = (state: ParserState): PrintAstNode | undefined => {
    const printToken = nextToken(state);

    if (!expectToken(state, TokenKind.LeftParen)) {
        return;
    }

    const expression = parseExpression(state);

    if (!expression) {
        return;
    }

    const close = expectToken(state, TokenKind.RightParen);

    if (!close) {
        return;
    }

    return {
        kind: AstNodeKind.Print,
        expression,
        start: printToken.start,
        end: close.end,
    };
};

const parseStatement = (state: ParserState): AstNode | undefined => {
    const token = getToken(state);

    switch (token.kind) {
        case TokenKind.If:
            return parseIf(state);
        case TokenKind.For:
            return parseFor(state);
        case TokenKind.While:
            return parseWhile(state);
        case TokenKind.Print:
            return parsePrint(state);
        case TokenKind.Identifier:
            if (getToken(state, 1).kind === TokenKind.Assign) {
                nextToken(state);
                return parseAssignment(state, token);
            }

            return parseExpression(state);
        default:
            return parseExpression(state);
    }
};

const parseSequence = (state: ParserState): AstNode[] | undefined => {
    const statements: AstNode[] = [];

    do {
        const statement = parseStatement(state);

        if (!statement) {
            return;
        }

        statements.push(statement);
    } while (matchToken(state, TokenKind.Semicolon));

    return statements;
};

const parseProgram = (state: ParserState): BlockAstNode | undefined => {
    const statements = parseSequence(state);

    if (!statements) {
        return;
    }

    if (getToken(state).kind !== TokenKind.EndOfInput) {
        reportError(state);
        return;
    }

    return makeBlock(statements);
};

export const parse = (tokens: Token[]) => {
    const state: ParserState = {
        tokens,
        index: 0,
        errors: [],
    };

    return {
        ast: parseProgram(state),
        errors: state.errors,
    };
};
