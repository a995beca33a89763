import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * English stopword list plus generic academic vocabulary, read from data/stopwords.json.
 * No stemming.
 */
export const STOPWORDS: ReadonlySet<string> = new Set(
    z.array(z.string()).parse(
        JSON.parse(readFileSync(new URL('../../data/stopwords.json', import.meta.url), 'utf-8'))
    )
);
