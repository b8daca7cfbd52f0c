export const SCENARIO_A_HTML =
  '<html><body><p>This Agreement is effective as of January 1, 2023 and expires December 31, 2025.</p></body></html>';

export const SCENARIO_B_HTML =
  '<html><body><p>This Agreement is effective as of January 1, 2023.</p>' +
  '<p>Services commence on February 1, 2023.</p></body></html>';

/** Ten pages; renewal_term and audit_rights only appear on page 5 */
export const MASTER_SERVICES_PAGES = [
  'MASTER SERVICES AGREEMENT\nThis Agreement is effective as of March 1, 2024 between Alpha Corp and Beta LLC.',
  'This Agreement shall be governed by the laws of the State of Delaware.',
  'Customer shall pay fees of $12,500.00 per quarter.\nEither party may terminate with 30 days written notice.',
  'General provisions.',
  'This Agreement renews for successive one-year periods.\nAudit rights: Customer may audit once per year.',
  'Schedule A',
  'Schedule B',
  'Schedule C',
  'Schedule D',
  'Signature page',
];
