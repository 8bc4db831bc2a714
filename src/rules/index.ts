import type { Rule } from "../rule.js";
import { availabilityRule } from "./availability.js";
import { basicRule } from "./basic.js";
import { complianceRule } from "./compliance.js";
import { flagsRule } from "./flags.js";
import { freshnessRule } from "./freshness.js";
import { fulfillmentRule } from "./fulfillment.js";
import { geoRule } from "./geo.js";
import { identifiersRule } from "./identifiers.js";
import { itemInfoRule } from "./itemInfo.js";
import { mediaRule } from "./media.js";
import { merchantRule } from "./merchant.js";
import { performanceRule } from "./performance.js";
import { pricingRule } from "./pricing.js";
import { relatedRule } from "./related.js";
import { returnsRule } from "./returns.js";
import { reviewsRule } from "./reviews.js";
import { variantsRule } from "./variants.js";

/** Every rule module in evaluation order. Order only affects how rows and messages are listed. */
export const RULES: readonly Rule[] = [
  basicRule,
  identifiersRule,
  itemInfoRule,
  mediaRule,
  pricingRule,
  availabilityRule,
  variantsRule,
  fulfillmentRule,
  merchantRule,
  returnsRule,
  performanceRule,
  reviewsRule,
  complianceRule,
  relatedRule,
  geoRule,
  freshnessRule,
  flagsRule,
];

export {
  availabilityRule,
  basicRule,
  complianceRule,
  flagsRule,
  freshnessRule,
  fulfillmentRule,
  geoRule,
  identifiersRule,
  itemInfoRule,
  mediaRule,
  merchantRule,
  performanceRule,
  pricingRule,
  relatedRule,
  returnsRule,
  reviewsRule,
  variantsRule,
};
export { AVAILABILITY_VALUES } from "./availability.js";
export { RELATIONSHIP_TYPES } from "./related.js";
export { VARIANT_FIELDS } from "./variants.js";
export { parseFlag, isEnabledFlag } from "./flags.js";
