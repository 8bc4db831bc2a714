import type { Rule } from "../rule.js";
import { isHttpUrl } from "../scalars.js";
import { checkUrlList, isHttps } from "./shared.js";

export const mediaRule: Rule = {
  name: "media",
  fields: ["image_link", "additional_image_link", "video_link", "model_3d_link"],
  evaluate(record, report) {
    const image = report.text(record, "image_link");
    if (!record.has("image_link")) report.missing("image_link");
    else if (image === undefined || !isHttpUrl(image)) report.error("image_link", "E_URL", "image_link must be a valid http(s) URL");
    else if (!isHttps(image)) report.warn("image_link", "W_HTTPS", "image_link should use HTTPS");

    checkUrlList(record, report, "additional_image_link");
    checkUrlList(record, report, "video_link");
    checkUrlList(record, report, "model_3d_link");
  },
};
