import { z } from "zod";

/** Unquoted YAML scalars such as `password: 123456` arrive as numbers. */
const scalarString = z.union([z.string(), z.number()]).transform(String);

/** Keys of `configuration.yml`. Anything else in the file is ignored. */
export const configSchema = z.object({
  url: z.string().trim().min(1).url(),
  username: scalarString.pipe(z.string().trim().min(1)),
  password: scalarString,
});

export type CleanerConfig = z.infer<typeof configSchema>;
