import { format } from "date-fns";

export const DEFAULT_DATE_TEMPLATE = "yyMMdd HH:mm:ss";

/**
 * Named date templates. `iso-space` puts a space before the UTC offset,
 * which some log ingestion pipelines expect.
 */
export const NAMED_DATE_TEMPLATES = {
  iso: "yyyy-MM-dd'T'HH:mm:ss.SSSxxx",
  "iso-space": "yyyy-MM-dd'T'HH:mm:ss.SSS xxx",
} as const;
export type NamedDateTemplate = keyof typeof NAMED_DATE_TEMPLATES;

// A date-fns pattern or one of the named templates
export type DateTemplate = NamedDateTemplate | (string & {});

const isNamedDateTemplate = (
  template: string,
): template is NamedDateTemplate =>
  Object.prototype.hasOwnProperty.call(NAMED_DATE_TEMPLATES, template);

export const formatTimestamp = (
  date: Date,
  template: DateTemplate = DEFAULT_DATE_TEMPLATE,
): string =>
  format(
    date,
    isNamedDateTemplate(template) ? NAMED_DATE_TEMPLATES[template] : template,
  );
