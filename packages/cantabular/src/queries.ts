/** Counts for a static dataset, dimensions first so the response can be streamed */
export const QueryStaticDataset = `
query($dataset: String!, $variables: [String!]!, $filters: [Filter!]) {
  dataset(name: $dataset) {
    table(variables: $variables, filters: $filters) {
      dimensions {
        count
        variable { name label }
        categories { code label }
      }
      values
      error
    }
  }
}`;

export const QueryDimensionOptions = `
query($dataset: String!, $variables: [String!]!, $filters: [Filter!]) {
  dataset(name: $dataset) {
    table(variables: $variables, filters: $filters) {
      dimensions {
        variable { name label }
        categories { code label }
      }
      error
    }
  }
}`;

export const QueryDimensions = `
query($dataset: String!) {
  dataset(name: $dataset) {
    ruleBase {
      name
      isSourceOf {
        edges {
          node {
            name
            mapFrom {
              edges {
                node {
                  filterOnly
                  label
                  name
                }
              }
            }
            label
            categories {
              totalCount
            }
          }
        }
      }
    }
  }
}`;

/** Geography variables of a dataset: the rule base and what maps onto it */
export const QueryGeographyDimensions = `
query($dataset: String!, $limit: Int!, $offset: Int) {
  dataset(name: $dataset) {
    ruleBase {
      name
      isSourceOf(first: $limit, skip: $offset) {
        totalCount
        edges {
          node {
            name
            label
            categories {
              totalCount
            }
            mapFrom {
              edges {
                node {
                  filterOnly
                  label
                  name
                }
              }
            }
          }
        }
      }
    }
  }
}`;

export const QueryDimensionsByName = `
query($dataset: String!, $variables: [String!]!) {
  dataset(name: $dataset) {
    variables(names: $variables) {
      edges {
        node {
          name
          label
          categories {
            totalCount
          }
          mapFrom {
            edges {
              node {
                filterOnly
                label
                name
              }
            }
          }
        }
      }
    }
  }
}`;

export const QueryListDatasets = `
query {
  datasets {
    name
    description
  }
}`;

export interface QueryVariables {
  dataset?: string | undefined;
  variables?: string[] | undefined;
  limit?: number | undefined;
  offset?: number | undefined;
}

/** JSON body POSTed to `/graphql` */
export function graphQLRequestBody(query: string, variables: QueryVariables): { query: string; variables: QueryVariables } {
  return { query, variables };
}
