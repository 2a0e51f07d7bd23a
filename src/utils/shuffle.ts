/** Fisher-Yates shuffle into a new array; the input is left alone. */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
    const copy = items.slice();
    for (let i = copy.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
}

/** First occurrence wins. */
export function unique<T>(items: readonly T[]): T[] {
    return [...new Set(items)];
}
