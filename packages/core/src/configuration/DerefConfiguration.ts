import { z } from "zod";

export const DerefConfiguration = z.object({
  maxDepth: z
    .number()
    .int()
    .positive()
    .describe(
      `Maximum number of nested nodes the resolver enters, counting nodes reached through references. Deeper documents fail with "tooDeep"`
    )
    .default(512),
  shareResolvedComponents: z
    .boolean()
    .describe(
      `Resolve each component once and share the value between every reference to it`
    )
    .default(true),
  debug: z
    .boolean()
    .describe(`Enable debug logging for reference resolution`)
    .default(false),
});

export type DerefConfiguration = z.infer<typeof DerefConfiguration>;

export type DerefConfigurationInput = z.input<typeof DerefConfiguration>;
