import type { Rule } from "../rule.js";
import { isHttpUrl } from "../scalars.js";
import { charLength, isHttps } from "./shared.js";

const ID_MAX = 100;
const TITLE_MAX = 150;
const DESCRIPTION_MAX = 5000;

/**
 * Identity and basic fields: id, title, description, link.
 * description is the one field whose length cap is a hard error. Lengths count characters, not
 * UTF-16 units.
 */
export const basicRule: Rule = {
  name: "basic",
  fields: ["id", "title", "description", "link"],
  evaluate(record, report) {
    const id = report.text(record, "id");
    if (!record.has("id")) report.missing("id");
    else if (id !== undefined && charLength(id) > ID_MAX) {
      report.warn("id", "W_LENGTH", `id exceeds recommended max length of ${ID_MAX} characters`);
    }

    const title = report.text(record, "title");
    if (!record.has("title")) report.missing("title");
    else if (title !== undefined && charLength(title) > TITLE_MAX) {
      report.warn("title", "W_LENGTH", `title exceeds recommended max length of ${TITLE_MAX} characters`);
    }

    const description = report.text(record, "description");
    if (!record.has("description")) report.missing("description");
    else if (description !== undefined && charLength(description) > DESCRIPTION_MAX) {
      report.error("description", "E_LENGTH", `description exceeds max length of ${DESCRIPTION_MAX} characters`);
    }

    const link = report.text(record, "link");
    if (!record.has("link")) report.missing("link");
    else if (link === undefined || !isHttpUrl(link)) report.error("link", "E_URL", "link must be a valid http(s) URL");
    else if (!isHttps(link)) report.warn("link", "W_HTTPS", "link should use HTTPS");
  },
};
