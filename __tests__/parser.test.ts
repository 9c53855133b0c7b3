import test from "node:test";
import assert from "node:assert";
import { AstNodeKind } from "../src/language/ast.js";
import type { Diagnostic } from "../src/language/diagnostic.js";
import { parseScript } from "../src/language/evaluate.js";
import { parse } from "../src/language/parser.js";
import { renderAst } from "../src/language/printer.js";
import { tokenize } from "../src/language/tokenizer.js";

const assertTree = (script: string, tree: string) => {
    const result = parseScript(script);

    assert.deepStrictEqual(result.errors, []);
    assert.ok(result.ast);
    assert.strictEqual(renderAst(result.ast), tree);
};

const assertSyntaxError = (script: string, error: Diagnostic) => {
    assert.deepStrictEqual(parseScript(script), {
        ast: undefined,
        errors: [error],
    });
};

test("assignment node with positions", () => {
    assert.deepStrictEqual(parse(tokenize("x = 1").tokens), {
        ast: {
            kind: AstNodeKind.Block,
            statements: [
                {
                    kind: AstNodeKind.Assignment,
                    target: {
                        kind: AstNodeKind.Variable,
                        name: "x",
                        start: { line: 1, column: 1 },
                        end: { line: 1, column: 2 },
                    },
                    value: {
                        kind: AstNodeKind.NumberLiteral,
                        value: 1n,
                        start: { line: 1, column: 5 },
                        end: { line: 1, column: 6 },
                    },
                    start: { line: 1, column: 1 },
                    end: { line: 1, column: 6 },
                },
            ],
            start: { line: 1, column: 1 },
            end: { line: 1, column: 6 },
        },
        errors: [],
    });
});

test("multiplication binds tighter than addition", () => {
    assertTree(
        "1 + 2 * 3",
        `Block:
  BinOp(op='+')
    Number(1)
    BinOp(op='*')
      Number(2)
      Number(3)`,
    );
});

test("operators of one level associate to the left", () => {
    assertTree(
        "8 - 3 - 1",
        `Block:
  BinOp(op='-')
    BinOp(op='-')
      Number(8)
      Number(3)
    Number(1)`,
    );
});

test("parentheses group", () => {
    assertTree(
        "(1 + 2) * 3",
        `Block:
  BinOp(op='*')
    BinOp(op='+')
      Number(1)
      Number(2)
    Number(3)`,
    );
});

test("a lone body statement is not wrapped in a block", () => {
    assertTree(
        "if x > 1: print(x)",
        `Block:
  If:
    Condition:
      BinOp(op='>')
        Variable(x)
        Number(1)
    Body:
      Print:
        Variable(x)`,
    );
});

test("a body takes the rest of its sequence", () => {
    assertTree(
        "for i in range(0, 2): print(i); x = i",
        `Block:
  For:
    Iterator: i
    Range Start:
      Number(0)
    Range End:
      Number(2)
    Body:
      Block:
        Print:
          Variable(i)
        Assignment:
          Variable(x)
          Variable(i)`,
    );
});

test("else binds to the nearest if", () => {
    assertTree(
        "if a > 1: if b > 1: print(1) else: print(2)",
        `Block:
  If:
    Condition:
      BinOp(op='>')
        Variable(a)
        Number(1)
    Body:
      If:
        Condition:
          BinOp(op='>')
            Variable(b)
            Number(1)
        Body:
          Print:
            Number(1)
        Else:
          Print:
            Number(2)`,
    );
});

test("function calls and lists", () => {
    assertTree(
        "y = []; print(str(1, 2))",
        `Block:
  Assignment:
    Variable(y)
    List:
  Print:
    FunctionCall(str):
      Args:
        Number(1)
        Number(2)`,
    );
});

test("missing colon reports the offending token", () => {
    assertSyntaxError("if x > 5 print(1)", {
        kind: "SyntaxError",
        message: "Syntax error at line 1, token='print' (type='PRINT')",
        line: 1,
        column: 10,
        token: {
            text: "print",
            kind: "PRINT",
        },
    });
});

test("missing value at end of input", () => {
    assertSyntaxError("x = ", {
        kind: "SyntaxError",
        message: "Syntax error at end of input",
        line: 1,
        column: 5,
    });
    assertSyntaxError("x = 1;", {
        kind: "SyntaxError",
        message: "Syntax error at end of input",
        line: 1,
        column: 7,
    });
    assertSyntaxError("", {
        kind: "SyntaxError",
        message: "Syntax error at end of input",
        line: 1,
        column: 1,
    });
});

test("statements need a separator", () => {
    assertSyntaxError("1 2", {
        kind: "SyntaxError",
        message: "Syntax error at line 1, token='2' (type='NUMBER')",
        line: 1,
        column: 3,
        token: {
            text: "2",
            kind: "NUMBER",
        },
    });
});

test("comparisons only appear in conditions", () => {
    assertSyntaxError("print(1 < 2)", {
        kind: "SyntaxError",
        message: "Syntax error at line 1, token='<' (type='LT')",
        line: 1,
        column: 9,
        token: {
            text: "<",
            kind: "LT",
        },
    });
    assertSyntaxError("if 1 < 2 < 3: print(1)", {
        kind: "SyntaxError",
        message: "Syntax error at line 1, token='<' (type='LT')",
        line: 1,
        column: 10,
        token: {
            text: "<",
            kind: "LT",
        },
    });
});

test("syntax errors report the line of the token", () => {
    assertSyntaxError("x = 1;\ny = ]", {
        kind: "SyntaxError",
        message: "Syntax error at line 2, token=']' (type='RBRACKET')",
        line: 2,
        column: 5,
        token: {
            text: "]",
            kind: "RBRACKET",
        },
    });
});

test("only the first lex error is reported", () => {
    assertSyntaxError("a $ b @", {
        kind: "LexError",
        message: "Illegal character '$'",
        line: 1,
        column: 3,
    });
});
