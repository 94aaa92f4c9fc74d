/**
 * Zod schemas for OpenAI-style chat-completions payloads.
 *
 * Schemas are lenient about optional and null fields: providers differ in
 * which fields they populate, and a missing optional field must never fail
 * a response.
 */

import { z } from 'zod';

const looseString = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? '' : String(value)));

export const providerErrorSchema = z
  .object({
    message: looseString,
    code: looseString,
    type: looseString,
  })
  .passthrough();

export type WireProviderError = z.infer<typeof providerErrorSchema>;

export const wireToolCallSchema = z.object({
  id: z.string().nullish(),
  type: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish(),
    })
    .nullish(),
});

export const wireToolCallFragmentSchema = wireToolCallSchema.extend({
  index: z.number().int().nonnegative().nullish(),
});

export type WireToolCall = z.infer<typeof wireToolCallSchema>;
export type WireToolCallFragment = z.infer<typeof wireToolCallFragmentSchema>;

const usageDetailsSchema = z
  .object({
    reasoning_tokens: z.number().nullish(),
    cached_tokens: z.number().nullish(),
  })
  .passthrough();

export const wireUsageSchema = z
  .object({
    prompt_tokens: z.number().nullish(),
    completion_tokens: z.number().nullish(),
    total_tokens: z.number().nullish(),
    cost: z.number().nullish(),
    prompt_tokens_details: usageDetailsSchema.nullish(),
    completion_tokens_details: usageDetailsSchema.nullish(),
  })
  .passthrough();

export type WireUsage = z.infer<typeof wireUsageSchema>;

export const wireAnnotationSchema = z
  .object({
    type: z.string().catch(''),
    text: z.string().nullish().catch(undefined),
    url_citation: z
      .object({
        url: z.string().catch(''),
        title: z.string().nullish().catch(undefined),
        content: z.string().nullish().catch(undefined),
        start_index: z.number().nullish().catch(undefined),
        end_index: z.number().nullish().catch(undefined),
      })
      .nullish()
      .catch(undefined),
    file: z
      .object({
        name: z.string().catch(''),
        hash: z.string().catch(''),
        content: z.array(z.unknown()).catch([]),
      })
      .nullish()
      .catch(undefined),
  })
  .passthrough();

export type WireAnnotation = z.infer<typeof wireAnnotationSchema>;

/**
 * Annotation list that drops entries which are not objects, so one odd
 * annotation never costs the text it rides along with.
 */
const wireAnnotationsSchema = z
  .array(z.unknown())
  .transform((items) =>
    items.flatMap((item) => {
      const parsed = wireAnnotationSchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    })
  )
  .nullish()
  .catch(undefined);

export const completionResponseSchema = z
  .object({
    id: z.string().nullish(),
    model: z.string().nullish(),
    choices: z
      .array(
        z.object({
          index: z.number().nullish(),
          message: z.object({
            role: z.string().nullish(),
            content: z.string().nullish(),
            reasoning: z.string().nullish(),
            reasoning_content: z.string().nullish(),
            tool_calls: z.array(wireToolCallSchema).nullish(),
            annotations: wireAnnotationsSchema,
          }),
          finish_reason: z.string().nullish(),
        })
      )
      .nullish(),
    usage: wireUsageSchema.nullish(),
    annotations: wireAnnotationsSchema,
    error: providerErrorSchema.nullish(),
  })
  .passthrough();

export type WireCompletionResponse = z.infer<typeof completionResponseSchema>;

export const streamEventSchema = z
  .object({
    id: z.string().nullish(),
    choices: z
      .array(
        z.object({
          delta: z
            .object({
              content: z.string().nullish(),
              reasoning: z.string().nullish(),
              reasoning_content: z.string().nullish(),
              annotations: wireAnnotationsSchema,
              tool_calls: z.array(wireToolCallFragmentSchema).nullish(),
            })
            .nullish(),
          finish_reason: z.string().nullish(),
        })
      )
      .nullish(),
    usage: wireUsageSchema.nullish(),
    error: providerErrorSchema.nullish(),
  })
  .passthrough();

export type WireStreamEvent = z.infer<typeof streamEventSchema>;

const priceSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value == null ? '' : String(value)));

export const wireModelSchema = z
  .object({
    id: z.string(),
    created: z.number().nullish(),
    architecture: z
      .object({
        modality: z.string().nullish(),
        input_modalities: z.array(z.string()).nullish(),
        output_modalities: z.array(z.string()).nullish(),
        tokenizer: z.string().nullish(),
        instruct_type: z.string().nullish(),
      })
      .nullish(),
    pricing: z
      .object({
        prompt: priceSchema,
        completion: priceSchema,
        image: priceSchema,
        web_search: priceSchema,
      })
      .nullish(),
    supported_parameters: z.array(z.string()).nullish(),
  })
  .passthrough();

export type WireModel = z.infer<typeof wireModelSchema>;

export const modelsListSchema = z.object({
  data: z.array(wireModelSchema),
});

const wireContentPartSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('image_url'),
    image_url: z.object({
      url: z.string(),
      detail: z.enum(['auto', 'low', 'high']).nullish(),
    }),
  }),
  z.object({
    type: z.literal('file'),
    file: z.object({ filename: z.string(), file_data: z.string() }),
  }),
  z.object({
    type: z.literal('input_audio'),
    input_audio: z.object({ data: z.string(), format: z.string() }),
  }),
]);

export type WireContentPart = z.infer<typeof wireContentPartSchema>;

export const wireMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.union([z.string(), z.array(wireContentPartSchema)]).nullish(),
  name: z.string().nullish(),
  tool_call_id: z.string().nullish(),
  tool_calls: z.array(wireToolCallSchema).nullish(),
});

export type WireMessage = z.infer<typeof wireMessageSchema>;
