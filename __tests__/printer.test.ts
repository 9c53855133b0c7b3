import test from "node:test";
import assert from "node:assert";
import { parseScript } from "../src/language/evaluate.js";
import { renderAst } from "../src/language/printer.js";

const assertRendered = (script: string, lines: string[]) => {
    const { ast } = parseScript(script);

    assert.ok(ast);
    assert.strictEqual(renderAst(ast), lines.join("\n"));
};

test("literals", () => {
    assertRendered('y = [1, 2.50, True, "a"]', [
        "Block:",
        "  Assignment:",
        "    Variable(y)",
        "    List:",
        "      Number(1)",
        "      Number(2.5)",
        "      Boolean(True)",
        "      String(a)",
    ]);
});

test("integral floats keep their decimal point", () => {
    assertRendered("x = 3.0", ["Block:", "  Assignment:", "    Variable(x)", "    Number(3.0)"]);
});

test("while loop", () => {
    assertRendered("while x > 0: x = x - 1", [
        "Block:",
        "  While:",
        "    Condition:",
        "      BinOp(op='>')",
        "        Variable(x)",
        "        Number(0)",
        "    Body:",
        "      Assignment:",
        "        Variable(x)",
        "        BinOp(op='-')",
        "          Variable(x)",
        "          Number(1)",
    ]);
});

test("if with else and a call", () => {
    assertRendered('if x == 1: print("one") else: print(str(x))', [
        "Block:",
        "  If:",
        "    Condition:",
        "      BinOp(op='==')",
        "        Variable(x)",
        "        Number(1)",
        "    Body:",
        "      Print:",
        "        String(one)",
        "    Else:",
        "      Print:",
        "        FunctionCall(str):",
        "          Args:",
        "            Variable(x)",
    ]);
});

test("for loop", () => {
    assertRendered("for i in range(1, n + 1): print(i)", [
        "Block:",
        "  For:",
        "    Iterator: i",
        "    Range Start:",
        "      Number(1)",
        "    Range End:",
        "      BinOp(op='+')",
        "        Variable(n)",
        "        Number(1)",
        "    Body:",
        "      Print:",
        "        Variable(i)",
    ]);
});
