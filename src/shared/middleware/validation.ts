import Joi from 'joi';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

// ============================================
// Validation Schemas
// ============================================

export const uploadRequestSchema = Joi.object({
  filename: Joi.string().trim().min(1).max(255).required(),
  content_base64: Joi.string().base64().required(),
  content_type: Joi.string().max(100).optional()
});

export const chartRequestSchema = Joi.object({
  model: Joi.string().max(100).optional(),
  max_charts: Joi.number().integer().min(1).max(10).default(4)
});

export const forceCleanupSchema = Joi.object({
  purge_all: Joi.boolean().default(false)
});

export const sessionParamsSchema = Joi.object({
  id: Joi.string().pattern(/^[A-Za-z0-9_-]{1,128}$/).required().messages({
    'string.pattern.base': 'Session id may only contain letters, digits, "-" and "_"'
  })
});

// ============================================
// Validation Middleware Factory
// ============================================

type RequestPart = 'body' | 'params';

export const validateRequest = (schema: Joi.ObjectSchema, part: RequestPart = 'body') => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req[part] ?? {}, {
      abortEarly: false,
      stripUnknown: true
    });

    if (error) {
      const errors = error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message
      }));

      logger.warn('Validation failed', {
        path: req.path,
        errors
      });

      res.status(400).json({
        error: 'Validation error',
        message: 'Invalid request parameters',
        details: errors
      });
      return;
    }

    // Replace with the validated values (defaults applied)
    req[part] = value;
    next();
  };
};
