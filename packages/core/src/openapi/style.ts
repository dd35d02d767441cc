import { z } from "zod";

export const ParameterLocation = z.enum(["query", "header", "path", "cookie"]);

export type ParameterLocation = z.infer<typeof ParameterLocation>;

export const ParameterStyle = z.enum([
  "form",
  "simple",
  "matrix",
  "label",
  "spaceDelimited",
  "pipeDelimited",
  "deepObject",
]);

export type ParameterStyle = z.infer<typeof ParameterStyle>;

/**
 * The style a parameter at `location` uses when none is declared.
 */
export const defaultStyle = (location: ParameterLocation): ParameterStyle => {
  switch (location) {
    case "query":
    case "cookie":
      return "form";
    case "path":
    case "header":
      return "simple";
  }
};

export const defaultExplode = (style: ParameterStyle): boolean =>
  style === "form";
