import type { Diagnostic, TextRange } from "./diagnostic.js";

export const enum TokenKind {
    Number = "NUMBER",
    String = "STRING",
    Identifier = "IDENTIFIER",
    True = "TRUE",
    False = "FALSE",
    For = "FOR",
    In = "IN",
    Range = "RANGE",
    While = "WHILE",
    If = "IF",
    Else = "ELSE",
    Print = "PRINT",
    Plus = "PLUS",
    Minus = "MINUS",
    Times = "TIMES",
    Divide = "DIVIDE",
    Assign = "ASSIGN",
    Equals = "EQUALS",
    NotEquals = "NE",
    LessThan = "LT",
    GreaterThan = "GT",
    LessThanOrEqual = "LE",
    GreaterThanOrEqual = "GE",
    LeftParen = "LPAREN",
    RightParen = "RPAREN",
    LeftBracket = "LBRACKET",
    RightBracket = "RBRACKET",
    Comma = "COMMA",
    Colon = "COLON",
    Semicolon = "SEMICOLON",
    EndOfInput = "EOF",
}

interface BasicToken extends TextRange {
    kind: Exclude<TokenKind, TokenKind.Number | TokenKind.String | TokenKind.Identifier>;
    text: string;
}

export interface IdentifierToken extends TextRange {
    kind: TokenKind.Identifier;
    text: string;
}

export interface NumberToken extends TextRange {
    kind: TokenKind.Number;
    text: string;
    // bigint for integer literals, number for literals with a decimal point.
    value: bigint | number;
}

export interface StringToken extends TextRange {
    kind: TokenKind.String;
    text: string;
    value: string;
}

export type Token = BasicToken | IdentifierToken | NumberToken | StringToken;

const keywords: ReadonlyMap<string, BasicToken["kind"]> = new Map<string, BasicToken["kind"]>([
    ["for", TokenKind.For],
    ["in", TokenKind.In],
    ["range", TokenKind.Range],
    ["while", TokenKind.While],
    ["if", TokenKind.If],
    ["else", TokenKind.Else],
    ["print", TokenKind.Print],
    ["True", TokenKind.True],
    ["False", TokenKind.False],
]);

// Checked before single characters so that "<=" never lexes as "<" "=".
const twoCharOperators: ReadonlyMap<string, BasicToken["kind"]> = new Map<string, BasicToken["kind"]>([
    ["==", TokenKind.Equals],
    ["!=", TokenKind.NotEquals],
    ["<=", TokenKind.LessThanOrEqual],
    [">=", TokenKind.GreaterThanOrEqual],
]);

const oneCharOperators: ReadonlyMap<string, BasicToken["kind"]> = new Map<string, BasicToken["kind"]>([
    ["+", TokenKind.Plus],
    ["-", TokenKind.Minus],
    ["*", TokenKind.Times],
    ["/", TokenKind.Divide],
    ["=", TokenKind.Assign],
    ["<", TokenKind.LessThan],
    [">", TokenKind.GreaterThan],
    ["(", TokenKind.LeftParen],
    [")", TokenKind.RightParen],
    ["[", TokenKind.LeftBracket],
    ["]", TokenKind.RightBracket],
    [",", TokenKind.Comma],
    [":", TokenKind.Colon],
    [";", TokenKind.Semicolon],
]);

const isIgnoredWhitespace = (char: string) => char === " " || char === "\t";

const isAlphabetic = (char: string) => {
    const charCode = char.charCodeAt(0);

    return (charCode >= 65 && charCode <= 90) || (charCode >= 97 && charCode <= 122) || char === "_";
};

const isDigit = (char: string) => {
    const charCode = char.charCodeAt(0);

    return charCode >= 48 && charCode <= 57;
};

const isAlphaNumeric = (char: string) => isAlphabetic(char) || isDigit(char);

const range = (line: number, start: number, end: number): TextRange => ({
    start: {
        line,
        column: start + 1,
    },
    end: {
        line,
        column: end + 1,
    },
});

const tokenizeLine = (line: string, y: number, tokens: Token[], errors: Diagnostic[]) => {
    let x = 0;

    while (x < line.length) {
        const firstChar = line[x];

        if (isIgnoredWhitespace(firstChar)) {
            x++;
            continue;
        }

        if (isAlphabetic(firstChar)) {
            const start = x;

            x++;

            while (x < line.length && isAlphaNumeric(line[x])) {
                x++;
            }

            const text = line.slice(start, x);
            const keyword = keywords.get(text);

            if (keyword) {
                tokens.push({ kind: keyword, text, ...range(y, start, x) });
            } else {
                tokens.push({ kind: TokenKind.Identifier, text, ...range(y, start, x) });
            }

            continue;
        }

        if (isDigit(firstChar)) {
            const start = x;

            while (x < line.length && isDigit(line[x])) {
                x++;
            }

            let hasDot = false;

            if (line[x] === "." && x + 1 < line.length && isDigit(line[x + 1])) {
                hasDot = true;
                x++;

                while (x < line.length && isDigit(line[x])) {
                    x++;
                }
            }

            const text = line.slice(start, x);

            tokens.push({
                kind: TokenKind.Number,
                text,
                value: hasDot ? Number.parseFloat(text) : BigInt(text),
                ...range(y, start, x),
            });

            continue;
        }

        if (firstChar === '"') {
            const close = line.indexOf('"', x + 1);

            if (close === -1) {
                errors.push({
                    kind: "LexError",
                    message: "Unterminated string",
                    line: y,
                    column: x + 1,
                });

                x++;
                continue;
            }

            tokens.push({
                kind: TokenKind.String,
                text: line.slice(x, close + 1),
                value: line.slice(x + 1, close),
                ...range(y, x, close + 1),
            });

            x = close + 1;
            continue;
        }

        const pair = line.slice(x, x + 2);
        const twoCharKind = twoCharOperators.get(pair);

        if (twoCharKind) {
            tokens.push({ kind: twoCharKind, text: pair, ...range(y, x, x + 2) });
            x += 2;
            continue;
        }

        const oneCharKind = oneCharOperators.get(firstChar);

        if (oneCharKind) {
            tokens.push({ kind: oneCharKind, text: firstChar, ...range(y, x, x + 1) });
            x++;
            continue;
        }

        errors.push({
            kind: "LexError",
            message: `Illegal character '${firstChar}'`,
            line: y,
            column: x + 1,
        });

        x++;
    }
};

export const tokenize = (code: string) => {
    const errors: Diagnostic[] = [];
    const tokens: Token[] = [];
    const lines = code.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        tokenizeLine(lines[i], i + 1, tokens, errors);
    }

    const lastLine = lines.length;
    const lastColumn = lines[lines.length - 1].length;

    tokens.push({
        kind: TokenKind.EndOfInput,
        text: "",
        ...range(lastLine, lastColumn, lastColumn),
    });

    return {
        tokens,
        errors,
    };
};
