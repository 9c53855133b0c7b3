import { encodeScript, runSource, scriptFromQuery } from "./shell.js";
import { addCodeEditingListeners } from "./textArea.js";

const getElement = <T extends HTMLElement>(id: string, type: new () => T): T => {
    const element = document.getElementById(id);

    if (!(element instanceof type)) {
        throw new Error(`Missing element #${id}`);
    }

    return element;
};

const inputTextArea = getElement("inputTextArea", HTMLTextAreaElement);
const runButton = getElement("runButton", HTMLButtonElement);
const astButton = getElement("astButton", HTMLButtonElement);
const clearButton = getElement("clearButton", HTMLButtonElement);
const copyLinkButton = getElement("copyLinkButton", HTMLButtonElement);
const astTextArea = getElement("astTextArea", HTMLTextAreaElement);
const outputTextArea = getElement("outputTextArea", HTMLTextAreaElement);

const clearOutput = () => {
    astTextArea.value = "";
    outputTextArea.value = "";
};

const evaluate = (showAst: boolean) => {
    clearOutput();

    const start = performance.now();
    const result = runSource(inputTextArea.value);
    const end = performance.now();

    if (showAst) {
        astTextArea.value = result.astText;
    }

    outputTextArea.value = result.outputText;
    outputTextArea.scrollTop = outputTextArea.scrollHeight;

    if (result.succeeded) {
        console.log(`Evaluation completed successfully in ${end - start}ms!`);
    } else {
        console.log(`Evaluation failed after ${end - start}ms.`);
    }
};

addCodeEditingListeners(inputTextArea);

runButton.addEventListener("click", () => evaluate(false));
astButton.addEventListener("click", () => evaluate(true));
clearButton.addEventListener("click", clearOutput);

copyLinkButton.addEventListener("click", () => {
    const link = `${window.location.origin}${window.location.pathname}?${encodeScript(inputTextArea.value)}`;

    navigator.clipboard.writeText(link).catch((error: unknown) => {
        console.error("Failed to copy link:", error);
    });
});

inputTextArea.value =
    scriptFromQuery(window.location.search) ??
    `total = 0;
for i in range(1, 5):
    total = total + i;
    print("running total: " + str(total))`;
