/**
 * A natural sort key: alternating text and number segments.
 * "part10" becomes [['part', 10n]], so it orders after "part2".
 * Numbers are bigints so long digit runs (e.g. timestamps) keep full precision.
 */
export type NaturalSortKey = ReadonlyArray<readonly [string, bigint]>;

const SEGMENT_PATTERN = /([^0-9]*)([0-9]*)/g;

/**
 * Splits a string into (non-digit run, digit run) segments.
 * Digit runs compare as integers; an absent digit run counts as 0.
 */
export function naturalSortKey(value: string): NaturalSortKey {
    const key: Array<readonly [string, bigint]> = [];

    for (const match of value.matchAll(SEGMENT_PATTERN)) {
        const text = match[1] ?? '';
        const digits = match[2] ?? '';
        if (!text && !digits) {
            continue;
        }
        key.push([text, digits ? BigInt(digits) : 0n]);
    }

    return key;
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Compares two keys segment by segment, text before number.
 * A key that is a prefix of the other sorts first.
 */
export function compareNaturalKeys(a: NaturalSortKey, b: NaturalSortKey): number {
    const length = Math.min(a.length, b.length);

    for (let i = 0; i < length; i++) {
        const [textA, numberA] = a[i];
        const [textB, numberB] = b[i];

        const byText = compareText(textA, textB);
        if (byText !== 0) {
            return byText;
        }
        if (numberA !== numberB) {
            return numberA < numberB ? -1 : 1;
        }
    }

    return a.length - b.length;
}

/**
 * Compares two strings in natural order.
 */
export function compareNatural(a: string, b: string): number {
    return compareNaturalKeys(naturalSortKey(a), naturalSortKey(b));
}

/**
 * Returns a new array sorted naturally by the string each item maps to.
 * Items with equal keys keep their input order.
 */
export function naturalSort<T>(items: readonly T[], keyOf: (item: T) => string): T[] {
    return items
        .map((item) => ({ item, key: naturalSortKey(keyOf(item)) }))
        .sort((a, b) => compareNaturalKeys(a.key, b.key))
        .map(({ item }) => item);
}
