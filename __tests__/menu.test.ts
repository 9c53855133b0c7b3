import test from "node:test";
import assert from "node:assert";
import { formatReport, menuOptions, menuText, runMenu, validateCategory } from "../src/cli/menu.js";

const getOption = (choice: string) => {
    const option = menuOptions.get(choice);

    assert.ok(option);

    return option;
};

const runScripted = async (answers: string[]) => {
    const questions: string[] = [];
    const writes: string[] = [];

    await runMenu(
        async (question) => {
            questions.push(question);
            return answers.shift();
        },
        (text) => writes.push(text),
    );

    return { questions, writes };
};

const bannerLine = "==================== RESULT ====================";
const closingLine = "================================================";

test("menu text", () => {
    assert.strictEqual(
        menuText(),
        [
            "Plume Parser - Select an option:",
            "1. Arithmetic Expression (e.g., 3 + 5 * 2)",
            "2. List Declaration (e.g., myList = [1, 2, 3])",
            "3. For Loop (e.g., for i in range(1, 5): print(i))",
            "4. While Loop (e.g., x = 3; while x > 0: print(x); x = x - 1)",
            '5. If Statement (e.g., x = 7; if x == 5: print("five") else: print("other"))',
            "6. Simple Assignment (e.g., x = 42)",
            "7. General Statement (anything built from the constructs above)",
            "8. Exit",
            "",
        ].join("\n"),
    );
});

test("category checks", () => {
    assert.strictEqual(validateCategory(getOption("1"), "3 + 4"), undefined);
    assert.strictEqual(
        validateCategory(getOption("1"), "x = 1"),
        "Invalid arithmetic expression. Must contain operators (+,-,*,/)",
    );
    assert.strictEqual(validateCategory(getOption("2"), "y = [1, 2]"), undefined);
    assert.strictEqual(
        validateCategory(getOption("2"), "y = 1"),
        "Invalid list declaration. Format: name = [items]",
    );
    assert.strictEqual(validateCategory(getOption("3"), "for i in range(1, 3): print(i)"), undefined);
    assert.strictEqual(
        validateCategory(getOption("3"), "while x > 0: print(x)"),
        "Invalid for loop. Format: for var in range(start, end): statement",
    );
    assert.strictEqual(
        validateCategory(getOption("4"), "x > 0"),
        "Invalid while loop. Format: while condition: statement",
    );
    assert.strictEqual(
        validateCategory(getOption("5"), "if x > 0 print(x)"),
        "Invalid if statement. Format: if condition: statement [else: statement]",
    );
    assert.strictEqual(
        validateCategory(getOption("6"), "42"),
        "Invalid assignment. Format: variable = value",
    );
    assert.strictEqual(validateCategory(getOption("7"), "anything"), undefined);
});

test("report of a successful run", () => {
    assert.strictEqual(
        formatReport("print(2 * 3)"),
        [
            bannerLine,
            "Input: print(2 * 3)",
            "",
            "--- Abstract Syntax Tree (AST) ---",
            "Block:",
            "  Print:",
            "    BinOp(op='*')",
            "      Number(2)",
            "      Number(3)",
            "",
            "--- Program Output ---",
            "6",
            closingLine,
            "",
        ].join("\n"),
    );
});

test("report of a run without output", () => {
    assert.strictEqual(
        formatReport("x = 1"),
        [
            bannerLine,
            "Input: x = 1",
            "",
            "--- Abstract Syntax Tree (AST) ---",
            "Block:",
            "  Assignment:",
            "    Variable(x)",
            "    Number(1)",
            "",
            "--- Program Output ---",
            "(no output)",
            "",
            "--- Evaluation Result ---",
            "Output: 1",
            "Type: int",
            closingLine,
            "",
        ].join("\n"),
    );
});

test("report of an arithmetic expression", () => {
    assert.strictEqual(
        formatReport("3 + 5 * 2"),
        [
            bannerLine,
            "Input: 3 + 5 * 2",
            "",
            "--- Abstract Syntax Tree (AST) ---",
            "Block:",
            "  BinOp(op='+')",
            "    Number(3)",
            "    BinOp(op='*')",
            "      Number(5)",
            "      Number(2)",
            "",
            "--- Program Output ---",
            "(no output)",
            "",
            "--- Evaluation Result ---",
            "Output: 13",
            "Type: int",
            closingLine,
            "",
        ].join("\n"),
    );
});

test("report of a parse failure", () => {
    assert.strictEqual(
        formatReport("if x > 5 print(1)"),
        [
            bannerLine,
            "Input: if x > 5 print(1)",
            "",
            "--- Output ---",
            "Failed to parse: SyntaxError at 1:10: Syntax error at line 1, token='print' (type='PRINT')",
            closingLine,
            "",
        ].join("\n"),
    );
});

test("report of a runtime failure", () => {
    assert.strictEqual(
        formatReport("print(1 / 0)"),
        [
            bannerLine,
            "Input: print(1 / 0)",
            "",
            "--- Abstract Syntax Tree (AST) ---",
            "Block:",
            "  Print:",
            "    BinOp(op='/')",
            "      Number(1)",
            "      Number(0)",
            "",
            "--- Program Output ---",
            "(no output)",
            "",
            "--- Runtime Error ---",
            "ZeroDivisionError at 1:7: division by zero",
            closingLine,
            "",
        ].join("\n"),
    );
});

test("menu loop handles bad choices and failed checks", async () => {
    const { questions, writes } = await runScripted(["9", "6", "x", "8"]);

    assert.deepStrictEqual(questions, [
        "Enter choice: ",
        "Enter choice: ",
        "Enter simple assignment: ",
        "Enter choice: ",
    ]);
    assert.deepStrictEqual(writes, [
        menuText(),
        "Invalid choice. Please try again.\n\n",
        menuText(),
        "Syntax Error: Invalid assignment. Format: variable = value\n\n",
        menuText(),
        "Exiting.\n",
    ]);
});

test("each category asks with its own prompt", async () => {
    const { questions } = await runScripted(["1", "1 + 1", "2", "y = [1]", "3"]);

    assert.deepStrictEqual(questions, [
        "Enter choice: ",
        "Enter arithmetic expression: ",
        "Enter choice: ",
        "Enter list declaration: ",
        "Enter choice: ",
        "Enter for loop: ",
    ]);
    assert.strictEqual(getOption("4").prompt, "Enter while loop: ");
    assert.strictEqual(getOption("5").prompt, "Enter if statement: ");
    assert.strictEqual(getOption("7").prompt, "Enter any statement: ");
    assert.strictEqual(getOption("8").prompt, undefined);
});

test("menu loop runs code", async () => {
    const { writes } = await runScripted([" 7 ", "print(1)", "8"]);

    assert.deepStrictEqual(writes, [
        menuText(),
        formatReport("print(1)") + "\n",
        menuText(),
        "Exiting.\n",
    ]);
});

test("menu loop exits when input closes", async () => {
    const { writes } = await runScripted(["7"]);

    assert.deepStrictEqual(writes, [menuText(), "Exiting.\n"]);
});
