import { gql } from 'graphql-request';

/**
 * GraphQL queries for reading the source repository
 */

// Issues updated since a timestamp, oldest update first.
// Only the first 50 labels of an issue are fetched; totalCount tells callers when more exist.
export const GET_UPDATED_ISSUES = gql`
  query GetUpdatedIssues(
    $owner: String!
    $name: String!
    $since: DateTime!
    $labels: [String!]
    $states: [IssueState!]
    $first: Int = 100
    $after: String
  ) {
    repository(owner: $owner, name: $name) {
      issues(
        first: $first
        after: $after
        filterBy: { since: $since, labels: $labels, states: $states }
        orderBy: { field: UPDATED_AT, direction: ASC }
      ) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          number
          title
          url
          updatedAt
          labels(first: 50) {
            totalCount
            nodes {
              name
              color
            }
          }
        }
      }
    }
  }
`;

// All comments of a single issue with pagination
export const GET_ISSUE_COMMENTS = gql`
  query GetIssueComments($owner: String!, $name: String!, $number: Int!, $first: Int = 100, $after: String) {
    repository(owner: $owner, name: $name) {
      issue(number: $number) {
        comments(first: $first, after: $after) {
          pageInfo {
            hasNextPage
            endCursor
          }
          nodes {
            url
            createdAt
            bodyText
          }
        }
      }
    }
  }
`;
