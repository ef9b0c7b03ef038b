import { NextFunction, Request, Response } from 'express';
import { body, param, query, validationResult, ValidationChain } from 'express-validator';
import { STAGE_ORDER, StageName } from '../types';

export const JOB_TARGETS: Array<StageName | 'all'> = [...STAGE_ORDER, 'all'];

export const pipelineValidation = {
  trigger: [
    param('stage')
      .isIn(JOB_TARGETS)
      .withMessage(`stage must be one of ${JOB_TARGETS.join(', ')}`),
    body('resume').optional().isBoolean().toBoolean(),
    body('maxTiles')
      .optional()
      .isInt({ min: 1 })
      .toInt()
      .withMessage('maxTiles must be a positive integer'),
    body('limit')
      .optional()
      .isInt({ min: 0 })
      .toInt()
      .withMessage('limit must be a non-negative integer'),
    body('workers')
      .optional()
      .isInt({ min: 1, max: 16 })
      .toInt()
      .withMessage('workers must be between 1 and 16'),
    body('tier')
      .optional()
      .isIn(['high', 'medium', 'low'])
      .withMessage('tier must be high, medium or low'),
    body('skipWikidata').optional().isBoolean().toBoolean(),
    body('batchSize')
      .optional()
      .isInt({ min: 1, max: 1000 })
      .toInt()
      .withMessage('batchSize must be between 1 and 1000'),
    body('dryRun').optional().isBoolean().toBoolean(),
  ],

  logs: [
    query('lines')
      .optional()
      .isInt({ min: 1, max: 500 })
      .toInt()
      .withMessage('lines must be between 1 and 500'),
  ],
};

export const manualPoiValidation = [
  body('name')
    .isString()
    .trim()
    .isLength({ min: 1, max: 200 })
    .withMessage('Name is required (max 200 characters)'),
  body('category')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 1, max: 100 })
    .withMessage('Category must be between 1 and 100 characters'),
  body('lat')
    .isFloat({ min: -90, max: 90 })
    .toFloat()
    .withMessage('lat must be between -90 and 90'),
  body('lon')
    .isFloat({ min: -180, max: 180 })
    .toFloat()
    .withMessage('lon must be between -180 and 180'),
  body('description')
    .optional()
    .isString()
    .trim()
    .isLength({ max: 2000 })
    .withMessage('Description must be less than 2000 characters'),
];

export const idValidation = (paramName: string): ValidationChain => {
  return param(paramName)
    .trim()
    .notEmpty()
    .withMessage(`${paramName} is required`);
};

/**
 * Responds 400 with the collected express-validator errors, if any.
 */
export function handleValidation(req: Request, res: Response, next: NextFunction): void {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    res.status(400).json({ success: false, errors: errors.array() });
    return;
  }
  next();
}
