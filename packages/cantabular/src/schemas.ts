import { z } from 'zod';

export const CategorySchema = z.object({
  code: z.string(),
  label: z.string(),
});

export const VariableBaseSchema = z.object({
  name: z.string(),
  label: z.string(),
});

/** Dimension as sent upstream; `count` is absent from dimension-option queries */
export const RawDimensionSchema = z.object({
  variable: VariableBaseSchema,
  count: z.number().int().nonnegative().nullish(),
  categories: z.array(CategorySchema),
});

export type RawDimension = z.infer<typeof RawDimensionSchema>;

export const GraphQLErrorSchema = z.object({
  message: z.string(),
  locations: z.array(z.object({ line: z.number(), column: z.number() })).optional(),
  path: z.array(z.union([z.string(), z.number()])).optional(),
});

export const GraphQLErrorsSchema = z.array(GraphQLErrorSchema);

export const RawTableSchema = z.object({
  dimensions: z.array(RawDimensionSchema),
  values: z.array(z.number().int()).nullish(),
  error: z.string().nullish(),
});

export type RawTable = z.infer<typeof RawTableSchema>;

/** Envelope shared by every GraphQL response; `data` is validated per query */
export const GraphQLEnvelopeSchema = z.object({
  data: z.unknown(),
  errors: GraphQLErrorsSchema.nullish(),
});

export const StaticDatasetDataSchema = z.object({
  dataset: z
    .object({
      table: RawTableSchema.nullish(),
    })
    .nullish(),
});

export const DimensionOptionsDataSchema = z.object({
  dataset: z
    .object({
      table: z
        .object({
          dimensions: z.array(RawDimensionSchema),
          error: z.string().nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

const EdgesSchema = <T extends z.ZodTypeAny>(node: T) => z.object({ edges: z.array(z.object({ node })) });

const MapFromNodeSchema = z.object({
  filterOnly: z.union([z.string(), z.boolean()]).optional(),
  label: z.string(),
  name: z.string(),
});

export const DimensionsDataSchema = z.object({
  dataset: z
    .object({
      ruleBase: z.object({
        name: z.string(),
        isSourceOf: EdgesSchema(
          z.object({
            name: z.string(),
            label: z.string(),
            mapFrom: EdgesSchema(MapFromNodeSchema),
            categories: z.object({ totalCount: z.number() }),
          })
        ),
      }),
    })
    .nullish(),
});

const VariableNodeSchema = z.object({
  name: z.string(),
  label: z.string(),
  categories: z.object({ totalCount: z.number() }),
  mapFrom: z.array(EdgesSchema(MapFromNodeSchema)).optional(),
});

export const GeographyDimensionsDataSchema = z.object({
  dataset: z
    .object({
      ruleBase: z.object({
        name: z.string(),
        isSourceOf: z.object({
          totalCount: z.number(),
          edges: z.array(z.object({ node: VariableNodeSchema })),
        }),
      }),
    })
    .nullish(),
});

export const DimensionsByNameDataSchema = z.object({
  dataset: z
    .object({
      variables: z.object({
        edges: z.array(z.object({ node: VariableNodeSchema })),
      }),
    })
    .nullish(),
});

export const ListDatasetsDataSchema = z.object({
  datasets: z.array(z.object({ name: z.string(), description: z.string().optional() })),
});

export const CodebookResponseSchema = z.object({
  codebook: z.array(
    z.object({
      name: z.string(),
      label: z.string(),
      len: z.number(),
      codes: z.array(z.string()).optional(),
      labels: z.array(z.string()).optional(),
      mapFrom: z
        .array(
          z.object({
            sourceNames: z.array(z.string()).optional(),
            codes: z.array(z.string()).optional(),
          })
        )
        .optional(),
    })
  ),
  dataset: z.object({
    name: z.string(),
    digest: z.string().optional(),
    description: z.string().optional(),
    size: z.number().optional(),
    ruleBaseVariable: z.string().optional(),
    datetime: z.string().optional(),
  }),
});

/** Error body of a non-2xx response from either Cantabular host */
export const ErrorResponseSchema = z.object({
  message: z.string(),
});
