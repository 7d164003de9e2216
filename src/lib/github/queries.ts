import { gql } from "graphql-request";

export const repositoryMetadataQuery = gql`
  query RepositoryMetadata($owner: String!, $name: String!, $topicLimit: Int!) {
    repository(owner: $owner, name: $name) {
      id
      name
      owner {
        login
      }
      description
      stargazerCount
      forkCount
      primaryLanguage {
        name
      }
      createdAt
      pushedAt
      licenseInfo {
        name
      }
      isArchived
      isDisabled
      isFork
      url
      repositoryTopics(first: $topicLimit) {
        nodes {
          topic {
            name
          }
        }
      }
    }
    rateLimit {
      limit
      cost
      remaining
      resetAt
    }
  }
`;

export const REPOSITORY_TOPIC_LIMIT = 20;

export type RepositoryMetadataVariables = {
  owner: string;
  name: string;
  topicLimit: number;
};
