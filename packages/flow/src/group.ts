/**
 * Base of steps that run child steps
 */

import { declareFields, field, Step } from '@pipeboard/core';
import { z } from 'zod';

export const childrenSchema = z.array(z.custom<Step>((value) => value instanceof Step));

export abstract class GroupStep extends Step {
  declare children: Step[];
}

declareFields(GroupStep, {
  children: field(childrenSchema, { positional: true }),
});
