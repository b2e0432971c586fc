/**
 * Text Layout
 *
 * Greedy word wrap against a pixel width. The measure function comes from
 * the render backend so wrapping matches what is drawn.
 */

export type MeasureFn = (text: string) => number;

/**
 * Wrap single-paragraph text into lines narrower than `maxWidthPx`.
 *
 * Words are split on single spaces. A candidate line (`line + word + ' '`)
 * is kept while it measures strictly below the width. A word wider than the
 * whole width sits alone on its line, unsplit. Lines carry no trailing space.
 */
export function wrapText(text: string | null | undefined, maxWidthPx: number, measure: MeasureFn): string[] {
    if (!text) return [];

    const lines: string[] = [];
    let current = '';

    for (const word of text.split(' ')) {
        const candidate = `${current}${word} `;
        if (measure(candidate) < maxWidthPx) {
            current = candidate;
            continue;
        }

        if (current) {
            lines.push(current.trimEnd());
        }
        current = `${word} `;
    }

    const last = current.trimEnd();
    if (last) {
        lines.push(last);
    }

    return lines;
}
