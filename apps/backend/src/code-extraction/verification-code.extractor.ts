import { convert } from 'html-to-text';
import {
  CODE_PATTERN_DESCRIPTORS,
  CodePatternDescriptor,
} from './code-pattern.descriptors';

export type MessageContent = {
  subject?: string | null;
  text?: string | null;
  html?: string | null;
};

export type CodeCandidate = {
  code: string;
  patternName: string;
  /** Offset of the match within the searched text (subject, newline, body). */
  index: number;
};

export function resolveSearchableText(content: MessageContent): string {
  const subject = (content.subject || '').trim();
  let body = (content.text || '').trim();
  if (!body && content.html) {
    body = convert(content.html, { wordwrap: false }).trim();
  }
  return [subject, body].filter(Boolean).join('\n');
}

function collectMatches(
  descriptor: CodePatternDescriptor,
  searchable: string,
): CodeCandidate[] {
  const candidates: CodeCandidate[] = [];
  for (const match of searchable.matchAll(descriptor.expression)) {
    const rawCode = match[1];
    if (!rawCode || !descriptor.accept(rawCode)) continue;
    candidates.push({
      code: descriptor.normalize(rawCode),
      patternName: descriptor.name,
      index: match.index ?? 0,
    });
  }
  return candidates;
}

/**
 * Returns candidate codes ordered by pattern priority, then by position,
 * without repeating a code. The first element is the one to persist.
 */
export function extractVerificationCodes(
  content: MessageContent,
  descriptors: readonly CodePatternDescriptor[] = CODE_PATTERN_DESCRIPTORS,
): CodeCandidate[] {
  const searchable = resolveSearchableText(content);
  if (!searchable) return [];

  const seenCodes = new Set<string>();
  const ordered: CodeCandidate[] = [];
  for (const descriptor of descriptors) {
    for (const candidate of collectMatches(descriptor, searchable)) {
      if (seenCodes.has(candidate.code)) continue;
      seenCodes.add(candidate.code);
      ordered.push(candidate);
    }
  }
  return ordered;
}
