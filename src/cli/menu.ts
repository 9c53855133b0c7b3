import {
    formatDiagnostic,
    parseScript,
    renderAst,
    run,
    typeName,
    valueToString,
} from "../language/index.js";

// Resolves to undefined once the input is closed.
export type Ask = (question: string) => Promise<string | undefined>;
export type Write = (text: string) => void;

interface CategoryCheck {
    // "any": one of the parts must appear, "all": every part must.
    mode: "any" | "all";
    parts: string[];
    hint: string;
}

export interface MenuOption {
    label: string;
    // Absent on the exit choice, which reads no code.
    prompt?: string;
    check?: CategoryCheck;
}

export const menuOptions: ReadonlyMap<string, MenuOption> = new Map<string, MenuOption>([
    [
        "1",
        {
            label: "Arithmetic Expression (e.g., 3 + 5 * 2)",
            prompt: "Enter arithmetic expression: ",
            check: {
                mode: "any",
                parts: ["+", "-", "*", "/"],
                hint: "Invalid arithmetic expression. Must contain operators (+,-,*,/)",
            },
        },
    ],
    [
        "2",
        {
            label: "List Declaration (e.g., myList = [1, 2, 3])",
            prompt: "Enter list declaration: ",
            check: {
                mode: "all",
                parts: ["=", "[", "]"],
                hint: "Invalid list declaration. Format: name = [items]",
            },
        },
    ],
    [
        "3",
        {
            label: "For Loop (e.g., for i in range(1, 5): print(i))",
            prompt: "Enter for loop: ",
            check: {
                mode: "all",
                parts: ["for", "in", "range", ":", "("],
                hint: "Invalid for loop. Format: for var in range(start, end): statement",
            },
        },
    ],
    [
        "4",
        {
            label: "While Loop (e.g., x = 3; while x > 0: print(x); x = x - 1)",
            prompt: "Enter while loop: ",
            check: {
                mode: "all",
                parts: ["while", ":"],
                hint: "Invalid while loop. Format: while condition: statement",
            },
        },
    ],
    [
        "5",
        {
            label: 'If Statement (e.g., x = 7; if x == 5: print("five") else: print("other"))',
            prompt: "Enter if statement: ",
            check: {
                mode: "all",
                parts: ["if", ":"],
                hint: "Invalid if statement. Format: if condition: statement [else: statement]",
            },
        },
    ],
    [
        "6",
        {
            label: "Simple Assignment (e.g., x = 42)",
            prompt: "Enter simple assignment: ",
            check: {
                mode: "all",
                parts: ["="],
                hint: "Invalid assignment. Format: variable = value",
            },
        },
    ],
    [
        "7",
        {
            label: "General Statement (anything built from the constructs above)",
            prompt: "Enter any statement: ",
        },
    ],
    ["8", { label: "Exit" }],
]);

const exitChoice = "8";

export const menuText = () => {
    const lines = ["Plume Parser - Select an option:"];

    for (const [choice, option] of menuOptions) {
        lines.push(`${choice}. ${option.label}`);
    }

    return lines.join("\n") + "\n";
};

// Returns the hint to show when the source doesn't look like the chosen category.
export const validateCategory = (option: MenuOption, source: string): string | undefined => {
    const check = option.check;

    if (!check) {
        return;
    }

    const passes =
        check.mode === "any"
            ? check.parts.some((part) => source.includes(part))
            : check.parts.every((part) => source.includes(part));

    return passes ? undefined : check.hint;
};

const bannerWidth = 48;
const banner = (title: string) => {
    const padding = "=".repeat((bannerWidth - title.length - 2) / 2);

    return `${padding} ${title} ${padding}`;
};

export const formatReport = (source: string) => {
    const lines = [banner("RESULT"), `Input: ${source}`, ""];
    const parseResult = parseScript(source);

    if (!parseResult.ast) {
        lines.push("--- Output ---");

        for (const error of parseResult.errors) {
            lines.push(`Failed to parse: ${formatDiagnostic(error)}`);
        }
    } else {
        const result = run(parseResult.ast);
        const output = result.output.trimEnd();

        lines.push(
            "--- Abstract Syntax Tree (AST) ---",
            renderAst(parseResult.ast),
            "",
            "--- Program Output ---",
            output.length > 0 ? output : "(no output)",
        );

        if (result.value !== undefined) {
            lines.push(
                "",
                "--- Evaluation Result ---",
                `Output: ${valueToString(result.value)}`,
                `Type: ${typeName(result.value)}`,
            );
        }

        if (result.errors.length > 0) {
            lines.push("", "--- Runtime Error ---", ...result.errors.map(formatDiagnostic));
        }
    }

    lines.push("=".repeat(bannerWidth), "");

    return lines.join("\n");
};

export const runMenu = async (ask: Ask, write: Write) => {
    while (true) {
        write(menuText());

        const choice = (await ask("Enter choice: "))?.trim();

        if (choice === undefined || choice === exitChoice) {
            write("Exiting.\n");
            return;
        }

        const option = menuOptions.get(choice);
        const prompt = option?.prompt;

        if (!option || prompt === undefined) {
            write("Invalid choice. Please try again.\n\n");
            continue;
        }

        const source = await ask(prompt);

        if (source === undefined) {
            write("Exiting.\n");
            return;
        }

        const hint = validateCategory(option, source);

        if (hint !== undefined) {
            write(`Syntax Error: ${hint}\n\n`);
            continue;
        }

        write(formatReport(source) + "\n");
    }
};
