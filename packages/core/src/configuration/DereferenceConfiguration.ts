import { z } from "zod";

export const DereferenceConfiguration = z.object({
  "dereference.debug.trace": z
    .boolean()
    .describe(`Log every $ref followed while dereferencing`)
    .default(false),
});

export type DereferenceConfiguration = z.infer<typeof DereferenceConfiguration>;

export type DereferenceConfigurationInput = z.input<
  typeof DereferenceConfiguration
>;
