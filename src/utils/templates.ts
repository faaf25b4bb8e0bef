export type ResponseFormat = "json" | "html" | "txt";

export const FORMATS: Record<ResponseFormat, { contentType: string; extension: string; rendered: boolean }> = {
  json: { contentType: "application/json", extension: "json", rendered: false },
  html: { contentType: "text/html", extension: "html", rendered: true },
  txt: { contentType: "text/plain", extension: "txt", rendered: true },
};

export function isFormat(value: string): value is ResponseFormat {
  return Object.prototype.hasOwnProperty.call(FORMATS, value);
}

export type Cardinality = "one" | "many";

export type TemplateRequest =
  | { outcome: "success"; format: ResponseFormat; resource: string; method: string; cardinality: Cardinality }
  | { outcome: "error"; format: ResponseFormat; status: number };

/**
 * Template path for a rendered response.
 *   success: html/people_get_one.html
 *   error:   html/errors/404.html
 */
export function resolveTemplate(t: TemplateRequest): string {
  const { extension } = FORMATS[t.format];
  switch (t.outcome) {
    case "success":
      return `${t.format}/${t.resource}_${t.method.toLowerCase()}_${t.cardinality}.${extension}`;
    case "error":
      return `${t.format}/errors/${t.status}.${extension}`;
  }
}

/** A single item is addressed by `id`; `more` marks a sub-collection of it. */
export function cardinalityOf(params: Record<string, string | undefined>): Cardinality {
  return params.id && params.more === undefined ? "one" : "many";
}
