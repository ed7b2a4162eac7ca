import { z } from "zod"
import type { ConfigDocument } from "../../core/keys"

const scalar = z.union([z.string(), z.number(), z.boolean()])

/**
 * A config file is a mapping of scalars, lists of scalars and nested sections.
 */
export const configDocumentSchema: z.ZodType<ConfigDocument> = z.lazy(() =>
  z.record(z.string(), z.union([scalar, z.array(scalar), configDocumentSchema, z.null()])),
)
