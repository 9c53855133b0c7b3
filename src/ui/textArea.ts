const indentUnit = "    ";

// Keeps the indentation of the line being split, one level deeper after a ":".
export const nextLineIndentation = (text: string, cursor: number) => {
    let lineStart = cursor;

    while (lineStart > 0 && text[lineStart - 1] !== "\n") {
        lineStart--;
    }

    let indentationEnd = lineStart;

    while (indentationEnd < cursor && [" ", "\t"].includes(text[indentationEnd])) {
        indentationEnd++;
    }

    const indentation = text.slice(lineStart, indentationEnd);

    return text.slice(lineStart, cursor).trimEnd().endsWith(":")
        ? indentation + indentUnit
        : indentation;
};

// Start of a full indent unit directly before the cursor, if there is one.
export const dedentStart = (text: string, selectionStart: number, selectionEnd: number) => {
    if (selectionStart !== selectionEnd || selectionStart < indentUnit.length) {
        return;
    }

    const indentStart = selectionStart - indentUnit.length;

    if (text.slice(indentStart, selectionStart) !== indentUnit) {
        return;
    }

    return indentStart;
};

const insertIntoTextArea = (text: string, textArea: HTMLTextAreaElement) => {
    const textBefore = textArea.value.slice(0, textArea.selectionStart);
    const textAfter = textArea.value.slice(textArea.selectionEnd);

    const selectionPosition = textArea.selectionStart + text.length;
    textArea.value = textBefore + text + textAfter;
    textArea.selectionStart = textArea.selectionEnd = selectionPosition;

    const event = new InputEvent("input", {
        bubbles: true,
        cancelable: true,
        data: text,
    });

    textArea.dispatchEvent(event);
};

export const addCodeEditingListeners = (textArea: HTMLTextAreaElement) => {
    textArea.addEventListener("keydown", (event) => {
        if (event.key === "Enter") {
            event.preventDefault();
            insertIntoTextArea(
                "\n" + nextLineIndentation(textArea.value, textArea.selectionStart),
                textArea,
            );
            return;
        }

        if (event.key === "Tab") {
            event.preventDefault();
            insertIntoTextArea(indentUnit, textArea);
            return;
        }

        if (event.key !== "Backspace") {
            return;
        }

        const indentStart = dedentStart(
            textArea.value,
            textArea.selectionStart,
            textArea.selectionEnd,
        );

        if (indentStart === undefined) {
            return;
        }

        event.preventDefault();

        const textBefore = textArea.value.slice(0, indentStart);
        const textAfter = textArea.value.slice(textArea.selectionEnd);

        textArea.value = textBefore + textAfter;
        textArea.selectionStart = textArea.selectionEnd = indentStart;
    });
};
