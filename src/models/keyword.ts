/**
 * Rule-based text classifier that labels text by keyword containment.
 */

import { z } from 'zod';
import { parseParams } from '../config/params.js';
import { createModelResponse, type Example, exampleText, type ModelResponse } from '../types.js';
import { ModelAdapter } from './base.js';

const categorySchema = z.enum(['positive', 'negative']);
type KeywordCategory = z.infer<typeof categorySchema>;

export const keywordMatchingOptionsSchema = z.object({
  positiveKeywords: z.array(z.string()).optional(),
  negativeKeywords: z.array(z.string()).optional(),
  defaultLabel: z.string().optional(),
  caseSensitive: z.boolean().optional(),
  /** Category evaluation order; the first match wins. */
  priority: z.array(categorySchema).optional(),
  name: z.string().nullish(),
});

export type KeywordMatchingOptions = z.input<typeof keywordMatchingOptionsSchema>;

export class KeywordMatchingModel extends ModelAdapter {
  readonly positiveKeywords: string[];
  readonly negativeKeywords: string[];
  readonly defaultLabel: string;
  readonly caseSensitive: boolean;
  readonly priority: KeywordCategory[];

  constructor(opts: KeywordMatchingOptions = {}) {
    super({ name: opts.name });
    this.caseSensitive = opts.caseSensitive ?? false;
    this.positiveKeywords = (opts.positiveKeywords ?? []).map((kw) => this.normalize(kw));
    this.negativeKeywords = (opts.negativeKeywords ?? []).map((kw) => this.normalize(kw));
    this.defaultLabel = opts.defaultLabel ?? 'neutral';
    this.priority = opts.priority ?? ['positive', 'negative'];
  }

  static fromParams(params: Record<string, unknown>): KeywordMatchingModel {
    return new KeywordMatchingModel(
      parseParams(keywordMatchingOptionsSchema, params, 'keyword-matching'),
    );
  }

  predict(example: Example): ModelResponse {
    const text = this.normalize(exampleText(example));
    let matchedCategory: KeywordCategory | null = null;
    let matchedKeyword: string | null = null;

    for (const category of this.priority) {
      const keywords = category === 'positive' ? this.positiveKeywords : this.negativeKeywords;
      const keyword = keywords.find((kw) => text.includes(kw));
      if (keyword !== undefined) {
        matchedCategory = category;
        matchedKeyword = keyword;
        break;
      }
    }

    return createModelResponse({
      uid: example.uid,
      output: matchedCategory ?? this.defaultLabel,
      metadata: {
        matched_keyword: matchedKeyword,
        matched_category: matchedCategory,
        model_name: this.name,
      },
    });
  }

  private normalize(text: string): string {
    return this.caseSensitive ? text : text.toLowerCase();
  }
}
