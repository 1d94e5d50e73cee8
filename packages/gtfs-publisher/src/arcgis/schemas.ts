/**
 * Portal Response Schemas
 *
 * zod schemas for the parts of each portal response the publisher reads.
 * Unknown keys are stripped.
 */

import { z } from 'zod';

export const PortalErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    details: z.array(z.string()).optional(),
  }),
});

export const CreateGroupResponseSchema = z.object({
  group: z.object({
    id: z.string(),
    title: z.string(),
  }),
});

export const AddItemResponseSchema = z.object({
  id: z.string(),
  success: z.boolean().optional(),
});

export const CreateServiceResponseSchema = z.object({
  itemId: z.string(),
  serviceurl: z.string().url(),
  name: z.string().optional(),
  success: z.boolean().optional(),
});

export const AnalyzeResponseSchema = z.object({
  publishParameters: z.record(z.unknown()),
});

const SpatialReferenceSchema = z.object({
  wkid: z.number(),
  latestWkid: z.number().optional(),
});

export const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const GeneratedFeatureSchema = z.object({
  geometry: z.object({
    x: z.number(),
    y: z.number(),
    spatialReference: SpatialReferenceSchema.optional(),
  }),
  attributes: z.record(AttributeValueSchema),
});

export const GenerateResponseSchema = z.object({
  featureCollection: z.object({
    layers: z.array(
      z.object({
        featureSet: z.object({
          features: z.array(GeneratedFeatureSchema),
        }),
      })
    ),
  }),
});

export const SuccessResponseSchema = z.object({
  success: z.boolean(),
});

export const AddFeaturesResponseSchema = z.object({
  addResults: z.array(
    z.object({
      objectId: z.number().optional(),
      success: z.boolean(),
      error: z
        .object({
          code: z.number().optional(),
          description: z.string().optional(),
        })
        .optional(),
    })
  ),
});

export const ShareResponseSchema = z.object({
  notSharedWith: z.array(z.string()).default([]),
  itemId: z.string().optional(),
});
