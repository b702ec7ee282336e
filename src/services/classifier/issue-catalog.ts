import type { IssueType } from '../../types/index.js';

interface CatalogEntry {
  title: string;
  description: string;
}

/** Merchant-facing copy used when a detector message is missing or too technical. */
export const ISSUE_CATALOG: Record<IssueType, CatalogEntry> = {
  missing_purchase_control: {
    title: 'Add to Cart button may not be working',
    description:
      "We couldn't find a working Add to Cart button on this page. Customers may not be able to purchase this product.",
  },
  purchase_flow_broken: {
    title: 'Add to Cart is not completing',
    description: 'Clicking Add to Cart did not add the product to the cart. Customers may be unable to buy.',
  },
  checkout_broken: {
    title: 'Checkout may be unreachable',
    description: 'We could not reach checkout from this product. Customers may be unable to complete a purchase.',
  },
  variant_selection_broken: {
    title: 'Variant selector may have issues',
    description:
      'The product variant selector might not be working correctly. Customers may have trouble selecting options.',
  },
  script_error: {
    title: 'JavaScript errors detected',
    description: 'We detected JavaScript errors on this page. This may affect functionality and customer experience.',
  },
  template_error: {
    title: 'Template errors detected',
    description: 'There may be template errors on this page. Some content might not display correctly.',
  },
  missing_images: {
    title: 'Product images may not be loading',
    description: "We couldn't verify that product images are loading correctly. Customers may not see product photos.",
  },
  missing_price: {
    title: 'Price may not be visible',
    description: "We couldn't find a visible price on this page. Customers may be confused about the cost.",
  },
  slow_load: {
    title: 'Page is loading slowly',
    description: 'This page took longer than expected to load. This may affect customer experience.',
  },
};
