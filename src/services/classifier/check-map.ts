import type { IssueType, Severity } from '../../types/index.js';

export interface CheckMapping {
  issueType: IssueType;
  severity: Severity;
}

/**
 * Detector check name → issue type and the severity a failing check carries.
 * A warning verdict always downgrades to low regardless of this table.
 */
export const CHECK_MAP: Readonly<Record<string, CheckMapping>> = {
  add_to_cart: { issueType: 'missing_purchase_control', severity: 'high' },
  atc_funnel: { issueType: 'purchase_flow_broken', severity: 'high' },
  checkout: { issueType: 'checkout_broken', severity: 'high' },
  variant_interaction: { issueType: 'variant_selection_broken', severity: 'high' },
  javascript_errors: { issueType: 'script_error', severity: 'high' },
  liquid_errors: { issueType: 'template_error', severity: 'medium' },
  price_visibility: { issueType: 'missing_price', severity: 'high' },
  product_images: { issueType: 'missing_images', severity: 'medium' },
  page_load_time: { issueType: 'slow_load', severity: 'low' },
};

export function lookupCheck(check: string): CheckMapping | null {
  return Object.hasOwn(CHECK_MAP, check) ? CHECK_MAP[check] : null;
}
