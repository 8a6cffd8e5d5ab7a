export type CodePatternDescriptor = {
  name: string;
  /** Must be global; the first capture group holds the raw code. */
  expression: RegExp;
  accept: (rawCode: string) => boolean;
  normalize: (rawCode: string) => string;
};

const LABELED_CAPTURE = String.raw`(\d{3,4}[- ]\d{3,4}|[A-Za-z0-9]{4,8})(?![A-Za-z0-9])`;
const LABEL_SUFFIX = String.raw`(?:\s+is)?\s*[:：]?\s*`;

const containsDigit = (rawCode: string): boolean => /\d/.test(rawCode);
const stripSeparators = (rawCode: string): string =>
  rawCode.replace(/[-\s]/g, '');

// Ordered from most to least specific; earlier descriptors win.
export const CODE_PATTERN_DESCRIPTORS: readonly CodePatternDescriptor[] = [
  {
    name: 'labeled_verification_code',
    expression: new RegExp(
      String.raw`\b(?:verification|confirmation|security|login|one[- ]time)\s+code${LABEL_SUFFIX}${LABELED_CAPTURE}`,
      'gi',
    ),
    accept: containsDigit,
    normalize: stripSeparators,
  },
  {
    name: 'labeled_cjk_code',
    expression: new RegExp(
      String.raw`(?:验证码|校验码|动态码)\s*(?:是|为)?\s*[:：]?\s*([A-Za-z0-9]{4,8})(?![A-Za-z0-9])`,
      'g',
    ),
    accept: containsDigit,
    normalize: stripSeparators,
  },
  {
    name: 'labeled_otp_pin',
    expression: new RegExp(
      String.raw`\b(?:OTP|PIN|passcode)(?:\s+code)?${LABEL_SUFFIX}(\d{4,8})(?![A-Za-z0-9])`,
      'gi',
    ),
    accept: () => true,
    normalize: stripSeparators,
  },
  {
    name: 'labeled_code',
    expression: new RegExp(String.raw`\bcode${LABEL_SUFFIX}${LABELED_CAPTURE}`, 'gi'),
    accept: containsDigit,
    normalize: stripSeparators,
  },
  {
    name: 'bare_digits',
    expression: /\b(\d{4,8})\b/g,
    accept: () => true,
    normalize: stripSeparators,
  },
];
