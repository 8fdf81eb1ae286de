import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import { FIRST_INDEX } from './constants.js';
import {
  type SampleRequestBody,
  type ThresholdsUpdateBody,
  alertsQuerySchema,
  sampleRequestSchema,
  thresholdsUpdateSchema,
} from './schemas.js';

interface ValidationResult<T> {
  valid: true;
  data: T;
}

interface ValidationError {
  valid: false;
  error: string;
}

export type ValidateResult<T> = ValidationResult<T> | ValidationError;

/** First issue rendered as `path: message` */
export const formatZodError = (error: ZodError): string => {
  const { issues } = error;
  const [firstIssue] = issues;
  if (firstIssue === undefined) return 'Validation failed';
  const { path, message } = firstIssue;
  const field = path.join('.');
  return field.length > FIRST_INDEX ? `${field}: ${message}` : message;
};

const validate = <T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): ValidateResult<T> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    return {
      valid: false,
      error: formatZodError(result.error),
    };
  }

  return {
    valid: true,
    data: result.data,
  };
};

export const validateSampleRequest = (body: unknown): ValidateResult<SampleRequestBody> =>
  validate(sampleRequestSchema, body);

export const validateThresholdsUpdate = (body: unknown): ValidateResult<ThresholdsUpdateBody> =>
  validate(thresholdsUpdateSchema, body);

export const validateAlertsQuery = (query: unknown): ValidateResult<{ limit?: number | undefined }> =>
  validate(alertsQuerySchema, query);
