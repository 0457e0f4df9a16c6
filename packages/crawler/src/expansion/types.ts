import type { Charset } from '../charset/charset.js';

type ChildReason = 'pivot' | 'sibling' | 'fallback';

type ChildEnqueue = {
  prefix: string;
  priority: number;
  reason: ChildReason;
};

type ExpansionOptions = {
  maxResults: number;
  charset: Charset;
};

type ExpansionResult = {
  names: string[];
  children: ChildEnqueue[];
};

export type { ChildReason, ChildEnqueue, ExpansionOptions, ExpansionResult };
