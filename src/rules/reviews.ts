import type { Rule } from "../rule.js";
import { parseInteger, parseNumber } from "../scalars.js";

export const reviewsRule: Rule = {
  name: "reviews",
  fields: ["product_review_count", "product_review_rating", "q_and_a", "raw_review_data"],
  evaluate(record, report) {
    if (record.has("product_review_count")) {
      const count = parseInteger(record.get("product_review_count"));
      if (count === null) {
        report.warn("product_review_count", "W_FORMAT", "product_review_count should be an integer");
      } else if (count < 0) {
        report.warn("product_review_count", "W_RANGE", "product_review_count must be non-negative");
      }
    }

    if (record.has("product_review_rating")) {
      const rating = parseNumber(record.get("product_review_rating"));
      if (rating === null) {
        report.warn("product_review_rating", "W_FORMAT", "product_review_rating should be numeric");
      } else if (rating < 0 || rating > 5) {
        report.warn("product_review_rating", "W_RANGE", "product_review_rating should be between 0 and 5");
      }
    }
  },
};
