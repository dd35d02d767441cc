import { z } from "zod";
import { orderedEntries, orderedRecord } from "../record/ordered.js";

const isRecordObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * A string-keyed record whose parsed value keeps the input's key order.
 * Used for every map in the model in place of `z.record`.
 */
export const OrderedRecord = <T>(value: z.ZodType<T>) =>
  z
    .preprocess((input, ctx) => {
      if (isRecordObject(input)) return orderedEntries(input);
      ctx.addIssue({ code: "custom", message: "Expected an object", input });
      return z.NEVER;
    }, z.array(z.tuple([z.string(), value])))
    .transform((entries) => orderedRecord(entries));
