export interface ParsedSeries {
    samples: number[];
    truncated: boolean;
}

const SEPARATORS = /[,\s;]+/;
const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Parse free-form text into integer samples. Tokens that are not plain
 * integers are skipped; parsing stops once `maxPoints` samples are read.
 */
export function parseSeries(text: string, maxPoints: number): ParsedSeries {
    const trimmed = text.trim();
    if (trimmed === '') {
        return { samples: [], truncated: false };
    }

    const samples: number[] = [];
    for (const token of trimmed.split(SEPARATORS)) {
        if (!INTEGER_TOKEN.test(token)) continue;
        if (samples.length >= maxPoints) {
            return { samples, truncated: true };
        }
        samples.push(parseInt(token, 10));
    }

    return { samples, truncated: false };
}

export function truncateSeries(samples: readonly number[], maxPoints: number): ParsedSeries {
    return {
        samples: samples.slice(0, maxPoints),
        truncated: samples.length > maxPoints,
    };
}
