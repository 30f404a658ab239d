import { z } from 'zod';
import { NamedError } from '../../util/errors';

export const InvalidVectorError = NamedError.create(
  'InvalidVectorError',
  z.object({
    message: z.string(),
    vector: z.string(),
  })
);

export const UnknownMetricValueError = NamedError.create(
  'UnknownMetricValueError',
  z.object({
    message: z.string(),
    identifier: z.string(),
    value: z.string(),
    version: z.enum(['2', '3']),
  })
);
