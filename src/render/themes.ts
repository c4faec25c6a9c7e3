/**
 * PDF visual themes.
 *
 * One entry per PdfStyle; the Record type keeps the table exhaustive.
 */

import { PdfStyle } from '../domain/document';

export interface PdfFontFamily {
  regular: string;
  bold: string;
  mono: string;
}

export interface PdfTheme {
  titleColor: string;
  headingColor: string;
  textColor: string;
  accentColor: string;
  /** Drawn under the title; 0 hides the rule. */
  titleRuleWidth: number;
  fonts: PdfFontFamily;
  sizes: {
    title: number;
    h1: number;
    h2: number;
    h3: number;
    body: number;
    table: number;
    code: number;
  };
  table: {
    headerFill: string;
    headerText: string;
    grid: string;
  };
}

const HELVETICA: PdfFontFamily = {
  regular: 'Helvetica',
  bold: 'Helvetica-Bold',
  mono: 'Courier',
};

const TIMES: PdfFontFamily = {
  regular: 'Times-Roman',
  bold: 'Times-Bold',
  mono: 'Courier',
};

const SIZES: PdfTheme['sizes'] = {
  title: 24,
  h1: 18,
  h2: 14,
  h3: 12,
  body: 11,
  table: 10,
  code: 9,
};

const TABLE: PdfTheme['table'] = {
  headerFill: '#f8f9fa',
  headerText: '#374151',
  grid: '#e5e7eb',
};

export const PDF_THEMES: Record<PdfStyle, PdfTheme> = {
  // Professional, blue accent rule under the title.
  default: {
    titleColor: '#1a1a1a',
    headingColor: '#1a1a1a',
    textColor: '#333333',
    accentColor: '#3b82f6',
    titleRuleWidth: 2,
    fonts: HELVETICA,
    sizes: SIZES,
    table: TABLE,
  },
  modern: {
    titleColor: '#111827',
    headingColor: '#374151',
    textColor: '#1f2937',
    accentColor: '#3b82f6',
    titleRuleWidth: 0,
    fonts: HELVETICA,
    sizes: SIZES,
    table: TABLE,
  },
  minimal: {
    titleColor: '#000000',
    headingColor: '#000000',
    textColor: '#222222',
    accentColor: '#666666',
    titleRuleWidth: 0.5,
    fonts: TIMES,
    sizes: SIZES,
    table: TABLE,
  },
};
