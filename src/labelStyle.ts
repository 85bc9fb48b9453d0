import { LOCATION_FIELD_COUNT } from './locationParser.js';
import { CellPadding, HorizontalAlign, LayoutVariant, VerticalAlign } from './types.js';

export interface DescriptionBucket {
  maxLength: number;
  size: number;
}

export type DescriptionSizing =
  | {
      mode: 'bucketed';
      buckets: DescriptionBucket[];
      // Used past the last bucket, together with truncation.
      overflowSize: number;
      truncateAt: number;
      ellipsis: string;
      leadingOffset: number;
    }
  | {
      mode: 'fixed';
      size: number;
      leading: number;
    };

export interface LabelStyle {
  variant: LayoutVariant;
  regularFont: string;
  boldFont: string;
  // 1 for single-part labels, 2 for stacked pairs.
  partsPerBlock: 1 | 2;
  duplicateLoneRecord: boolean;
  blocksPerPage: number;
  gridLineWidth: number;
  labelColumnWidthCm: number;
  contentWidthCm: number;
  header: {
    partNumberText: string;
    descriptionText: string;
    size: number;
  };
  partNumber: {
    smallSize: number;
    largeSize: number;
    suffixLength: number;
    leading: number;
    align: HorizontalAlign;
    valign: VerticalAlign;
    padding: CellPadding;
    heightCm: number;
  };
  description: {
    sizing: DescriptionSizing;
    valign: VerticalAlign;
    padding: CellPadding;
    heightCm: number;
  };
  locationStrip: {
    label: string;
    labelSize: number;
    fieldSize: number;
    palette: string[];
    weights: number[];
    heightCm: number;
  };
  spacing: {
    afterFirstTableCm: number;
    afterBlockCm: number;
  };
}

export interface LabelStyleOverrides {
  regularFont?: string;
  boldFont?: string;
  blocksPerPage?: number;
  gridLineWidth?: number;
  labelColumnWidthCm?: number;
  contentWidthCm?: number;
  header?: Partial<LabelStyle['header']>;
  partNumber?: Partial<Omit<LabelStyle['partNumber'], 'padding'>> & { padding?: Partial<CellPadding> };
  description?: Partial<Omit<LabelStyle['description'], 'padding'>> & { padding?: Partial<CellPadding> };
  locationStrip?: Partial<LabelStyle['locationStrip']>;
  spacing?: Partial<LabelStyle['spacing']>;
}

export const LOCATION_PALETTE = ['#E9967A', '#ADD8E6', '#90EE90', '#FFD700', '#ADD8E6', '#E9967A', '#90EE90'];

const TABLE_PADDING: CellPadding = { top: 3, right: 5, bottom: 3, left: 5 };

const BASE = {
  regularFont: 'Helvetica',
  boldFont: 'Helvetica-Bold',
  blocksPerPage: 4,
  gridLineWidth: 1,
  labelColumnWidthCm: 4,
  contentWidthCm: 11,
  header: { partNumberText: 'Part No', descriptionText: 'Description', size: 16 },
  spacing: { afterFirstTableCm: 0.3, afterBlockCm: 0.2 }
};

const DEFAULT_STYLES: Record<LayoutVariant, LabelStyle> = {
  v1: {
    ...BASE,
    header: { ...BASE.header },
    spacing: { ...BASE.spacing },
    variant: 'v1',
    partsPerBlock: 2,
    duplicateLoneRecord: true,
    partNumber: {
      smallSize: 17,
      largeSize: 22,
      suffixLength: 5,
      leading: 20,
      align: 'left',
      valign: 'middle',
      padding: { ...TABLE_PADDING },
      heightCm: 1.3
    },
    description: {
      sizing: {
        mode: 'bucketed',
        buckets: [
          { maxLength: 30, size: 15 },
          { maxLength: 50, size: 13 },
          { maxLength: 70, size: 11 },
          { maxLength: 90, size: 10 }
        ],
        overflowSize: 9,
        truncateAt: 100,
        ellipsis: '...',
        leadingOffset: 2
      },
      valign: 'middle',
      padding: { ...TABLE_PADDING },
      heightCm: 0.8
    },
    locationStrip: {
      label: 'Part Location',
      labelSize: 16,
      fieldSize: 14,
      palette: [...LOCATION_PALETTE],
      weights: [1.8, 2.7, 1.3, 1.3, 1.3, 1.3, 1.3],
      heightCm: 0.8
    }
  },
  v2: {
    ...BASE,
    header: { ...BASE.header },
    spacing: { ...BASE.spacing },
    variant: 'v2',
    partsPerBlock: 1,
    duplicateLoneRecord: false,
    partNumber: {
      smallSize: 34,
      largeSize: 40,
      suffixLength: 5,
      leading: 12,
      align: 'center',
      valign: 'top',
      padding: { top: 10, right: 5, bottom: 5, left: 5 },
      heightCm: 1.9
    },
    description: {
      sizing: { mode: 'fixed', size: 20, leading: 16 },
      valign: 'middle',
      padding: { top: 0, right: 5, bottom: 0, left: 5 },
      heightCm: 2.1
    },
    locationStrip: {
      label: 'Part Location',
      labelSize: 16,
      fieldSize: 16,
      palette: [...LOCATION_PALETTE],
      weights: [1.7, 2.9, 1.3, 1.2, 1.3, 1.3, 1.3],
      heightCm: 0.9
    }
  }
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Builds the immutable style record for a layout variant. Overrides are
 * merged over the variant defaults; the strip palette and weights must keep
 * one entry per location field.
 */
export function createLabelStyle(variant: LayoutVariant, overrides?: LabelStyleOverrides): LabelStyle {
  const base = DEFAULT_STYLES[variant];
  const o = overrides ?? {};
  const style: LabelStyle = {
    ...base,
    regularFont: o.regularFont ?? base.regularFont,
    boldFont: o.boldFont ?? base.boldFont,
    blocksPerPage: o.blocksPerPage ?? base.blocksPerPage,
    gridLineWidth: o.gridLineWidth ?? base.gridLineWidth,
    labelColumnWidthCm: o.labelColumnWidthCm ?? base.labelColumnWidthCm,
    contentWidthCm: o.contentWidthCm ?? base.contentWidthCm,
    header: { ...base.header, ...o.header },
    partNumber: {
      ...base.partNumber,
      ...o.partNumber,
      padding: { ...base.partNumber.padding, ...o.partNumber?.padding }
    },
    description: {
      ...base.description,
      ...o.description,
      padding: { ...base.description.padding, ...o.description?.padding }
    },
    locationStrip: {
      ...base.locationStrip,
      ...o.locationStrip,
      palette: [...(o.locationStrip?.palette ?? base.locationStrip.palette)],
      weights: [...(o.locationStrip?.weights ?? base.locationStrip.weights)]
    },
    spacing: { ...base.spacing, ...o.spacing }
  };

  const { palette, weights } = style.locationStrip;
  if (palette.length !== LOCATION_FIELD_COUNT || weights.length !== LOCATION_FIELD_COUNT) {
    throw new Error(`Location strip needs ${LOCATION_FIELD_COUNT} palette entries and weights`);
  }
  if (weights.some(weight => !(weight > 0))) {
    throw new Error('Location strip weights must be positive');
  }
  if (!(style.blocksPerPage >= 1)) {
    throw new Error('blocksPerPage must be at least 1');
  }

  return deepFreeze(style);
}
