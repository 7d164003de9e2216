import { GraphQLClient } from "graphql-request";

import { env } from "@/lib/env";

export type GithubClientOptions = {
  endpoint?: string;
  fetch?: typeof fetch;
};

export function createGithubClient(
  token: string,
  options: GithubClientOptions = {},
) {
  if (!token) {
    throw new Error(
      "GitHub token missing. Set GITHUB_TOKENS in your environment to enable API access.",
    );
  }

  return new GraphQLClient(options.endpoint ?? env.GITHUB_GRAPHQL_URL, {
    headers: {
      Authorization: `Bearer ${token}`,
      "User-Agent": "repo-harvester",
    },
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
}
