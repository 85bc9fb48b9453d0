import { LabelStyle } from './labelStyle.js';
import { TextRun } from './types.js';

export interface PartNumberTypography {
  runs: TextRun[];
  // Code-point index where the large suffix starts, or null when the whole number is one small run.
  splitIndex: number | null;
  leading: number;
}

export interface DescriptionTypography {
  text: string;
  size: number;
  leading: number;
  truncated: boolean;
}

/**
 * Long part numbers print the trailing digits larger so the distinguishing
 * suffix stands out: everything but the last `suffixLength` characters at
 * the small size, the suffix at the large size, both bold on one line.
 */
export function selectPartNumberTypography(partNumber: string, style: LabelStyle): PartNumberTypography {
  const { smallSize, largeSize, suffixLength, leading } = style.partNumber;
  const font = style.boldFont;
  const chars = Array.from(partNumber);

  if (chars.length <= suffixLength) {
    return {
      runs: [{ text: partNumber, font, size: smallSize }],
      splitIndex: null,
      leading
    };
  }

  const splitIndex = chars.length - suffixLength;
  return {
    runs: [
      { text: chars.slice(0, splitIndex).join(''), font, size: smallSize },
      { text: chars.slice(splitIndex).join(''), font, size: largeSize }
    ],
    splitIndex,
    leading
  };
}

export function selectDescriptionTypography(description: string, style: LabelStyle): DescriptionTypography {
  const sizing = style.description.sizing;

  if (sizing.mode === 'fixed') {
    return { text: description, size: sizing.size, leading: sizing.leading, truncated: false };
  }

  // Lengths count code points so a cut never splits a surrogate pair.
  const chars = Array.from(description);
  const bucket = sizing.buckets.find(entry => chars.length <= entry.maxLength);
  if (bucket) {
    return {
      text: description,
      size: bucket.size,
      leading: bucket.size + sizing.leadingOffset,
      truncated: false
    };
  }

  const truncated = chars.length > sizing.truncateAt;
  return {
    text: truncated ? chars.slice(0, sizing.truncateAt).join('') + sizing.ellipsis : description,
    size: sizing.overflowSize,
    leading: sizing.overflowSize + sizing.leadingOffset,
    truncated
  };
}
