/**
 * CloudTrail CreateUser event (delivered via EventBridge) - input schema
 *
 * Only the principal name is read. The rest of the envelope is not checked, so
 * an unexpected type elsewhere never hides a valid user name.
 */

import { z } from 'zod';

export const USER_NAME_PATH = 'detail.requestParameters.userName';

/** Anything that is not a non-empty string reads as "no user name". */
const optionalUserName = z.preprocess(
  (val) => (typeof val === 'string' && val.length > 0 ? val : undefined),
  z.string().optional()
);

export const CreationEventSchema = z
  .object({
    detail: z
      .object({
        requestParameters: z
          .object({
            userName: optionalUserName,
          })
          .passthrough()
          .nullish()
          .catch(undefined),
      })
      .passthrough()
      .nullish()
      .catch(undefined),
  })
  .passthrough();

export type CreationEvent = z.infer<typeof CreationEventSchema>;

/**
 * Principal name carried by the event, or undefined when absent or malformed
 */
export function extractUserName(event: unknown): string | undefined {
  const parsed = CreationEventSchema.safeParse(event);
  if (!parsed.success) return undefined;
  return parsed.data.detail?.requestParameters?.userName;
}
