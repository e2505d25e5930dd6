import { Block } from '../../src/types/document.js';

export const POLICY_TABLE = '| zone | price |\n| --- | --- |\n| north | 12 |';

/** Title, two paragraphs and a table across three pages: one parent with three children */
export function policyBlocks(): Block[] {
  return [
    { type: 'title', text: 'Shipping Policy', pageNumbers: [0] },
    { type: 'text', text: 'Northwind Logistics ships parcels within three business days.', pageNumbers: [0] },
    { type: 'table', text: '', tableBody: POLICY_TABLE, pageNumbers: [1] },
    { type: 'text', text: 'Returns are accepted within thirty days.', pageNumbers: [2] },
    { type: 'footer', text: 'Confidential', pageNumbers: [2] },
  ];
}

export const POLICY_PARENT = [
  'Shipping Policy',
  'Northwind Logistics ships parcels within three business days.',
  POLICY_TABLE,
  'Returns are accepted within thirty days.',
].join('\n\n');

export const POLICY_BYTES = Buffer.from('%PDF-1.7 shipping policy');
