// Labeled-field extraction from free-form model output
// Expected shape: ANSWER: ... REASONING: ... CONFIDENCE: high|medium|low

import { isConfidence, type Confidence } from '../types/answer.js';

export interface ParsedAnswer {
  answer: string;
  reasoning: string;
  confidence: Confidence;
}

/** Swappable parsing strategy used by the Synthesizer */
export type ResponseParser = (raw: string) => ParsedAnswer;

export const FALLBACK_REASONING = 'Generated from available context';
export const MISSING_REASONING = 'Unable to process the available data.';

const LABELS = ['ANSWER', 'REASONING', 'CONFIDENCE'] as const;
type Label = typeof LABELS[number];

// Markdown bold around the label (**ANSWER:** or **ANSWER**:) is tolerated
const LABEL_RE = /\*{0,2}\b(ANSWER|REASONING|CONFIDENCE)\b\*{0,2}\s*:\s*\*{0,2}/g;

function isLabel(value: string): value is Label {
  return LABELS.some(l => l === value);
}

/**
 * Split a response into labeled fields. Each field runs from its label to the
 * next recognised label or the end of text; the first occurrence of a label wins.
 */
export function extractLabeledFields(raw: string): Partial<Record<Label, string>> {
  const marks: Array<{ label: Label; start: number; end: number }> = [];
  for (const m of raw.matchAll(LABEL_RE)) {
    const label = m[1];
    if (m.index === undefined || !isLabel(label)) continue;
    marks.push({ label, start: m.index, end: m.index + m[0].length });
  }

  const fields: Partial<Record<Label, string>> = {};
  marks.forEach((mark, i) => {
    if (fields[mark.label] !== undefined) return;
    const next = marks[i + 1];
    fields[mark.label] = raw.slice(mark.end, next ? next.start : raw.length).trim();
  });
  return fields;
}

export function parseConfidence(value: string | undefined): Confidence {
  const word = value?.match(/\w+/)?.[0]?.toLowerCase();
  return word && isConfidence(word) ? word : 'low';
}

export const parseLabeledResponse: ResponseParser = (raw) => {
  const content = raw.trim();
  const fields = extractLabeledFields(content);

  if (!fields.ANSWER) {
    return {
      answer: content,
      reasoning: FALLBACK_REASONING,
      confidence: 'medium',
    };
  }

  return {
    answer: fields.ANSWER,
    reasoning: fields.REASONING || MISSING_REASONING,
    confidence: parseConfidence(fields.CONFIDENCE),
  };
};
