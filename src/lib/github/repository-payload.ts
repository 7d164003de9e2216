import { z } from "zod";

const nullableString = z.string().nullish();
const namedNode = z.object({ name: nullableString }).passthrough().nullish();

/**
 * Shape of `repository` in {@link repositoryMetadataQuery}. Every field is
 * optional here: missing essentials are the transform's call, while a value of
 * the wrong type means the response cannot be trusted at all.
 */
export const repositoryNodeSchema = z
  .object({
    id: nullableString,
    name: nullableString,
    owner: z.object({ login: nullableString }).passthrough().nullish(),
    description: nullableString,
    stargazerCount: z.number().int().nullish(),
    forkCount: z.number().int().nullish(),
    primaryLanguage: namedNode,
    createdAt: nullableString,
    pushedAt: nullableString,
    licenseInfo: namedNode,
    isArchived: z.boolean().nullish(),
    isDisabled: z.boolean().nullish(),
    isFork: z.boolean().nullish(),
    url: nullableString,
    repositoryTopics: z
      .object({
        nodes: z
          .array(
            z
              .object({
                topic: z.object({ name: nullableString }).passthrough().nullish(),
              })
              .passthrough()
              .nullable(),
          )
          .nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type RepositoryNode = z.infer<typeof repositoryNodeSchema>;

export const rateLimitBlockSchema = z
  .object({
    limit: z.number().nullish(),
    cost: z.number().nullish(),
    remaining: z.number().nullish(),
    resetAt: nullableString,
  })
  .passthrough();

export type RateLimitBlock = z.infer<typeof rateLimitBlockSchema>;

export const repositoryQueryResponseSchema = z.object({
  repository: z.unknown().optional(),
  rateLimit: rateLimitBlockSchema.nullish(),
});
