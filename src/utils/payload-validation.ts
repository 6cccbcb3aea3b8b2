/**
 * Payload Validation Module
 *
 * Validates upstream feed records and incoming form bodies against JSON
 * schemas using ajv. Feed records that fail validation are dropped by the
 * normalizer; invalid form bodies become 400 responses with field details.
 */

import Ajv, { ErrorObject, JSONSchemaType, SchemaObject } from 'ajv';
import { FeedMatch } from '../models/feed';
import { MatchOutcome } from '../models/user';
import { ValidationError } from '../models/errors';

// Feed records are checked as received
const feedAjv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  coerceTypes: false,
});

// Form bodies arrive as strings from urlencoded posts
const formAjv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: true,
});

/**
 * One match record from the upstream feed.
 * Unknown upstream fields are allowed through.
 */
const feedMatchSchema: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    homeTeam: {
      type: 'object',
      properties: { name: { type: 'string' } },
      required: ['name'],
    },
    awayTeam: {
      type: 'object',
      properties: { name: { type: 'string' } },
      required: ['name'],
    },
    status: { type: 'string' },
    score: {
      type: ['object', 'null'],
      properties: {
        fullTime: {
          type: ['object', 'null'],
          properties: {
            home: { type: ['integer', 'null'] },
            away: { type: ['integer', 'null'] },
          },
        },
      },
    },
    utcDate: { type: ['string', 'null'] },
    competition: {
      type: 'object',
      properties: {
        id: { type: 'integer' },
        name: { type: ['string', 'null'] },
      },
      required: ['id'],
    },
  },
  required: ['id', 'homeTeam', 'awayTeam', 'status', 'competition'],
};

/**
 * Sign-up form of the prediction game
 */
export interface RegistrationForm {
  username: string;
}

const registrationSchema: JSONSchemaType<RegistrationForm> = {
  type: 'object',
  properties: {
    username: { type: 'string', minLength: 3, maxLength: 20 },
  },
  required: ['username'],
  additionalProperties: true,
};

/**
 * Prediction form; goal fields default to 0 when omitted
 */
export interface PredictionForm {
  match_id: number;
  outcome: MatchOutcome;
  home_goals?: number | null;
  away_goals?: number | null;
}

const predictionSchema: JSONSchemaType<PredictionForm> = {
  type: 'object',
  properties: {
    match_id: { type: 'integer', minimum: 1 },
    outcome: { type: 'string', enum: [MatchOutcome.HOME, MatchOutcome.DRAW, MatchOutcome.AWAY] },
    home_goals: { type: 'integer', minimum: 0, maximum: 99, nullable: true },
    away_goals: { type: 'integer', minimum: 0, maximum: 99, nullable: true },
  },
  required: ['match_id', 'outcome'],
  additionalProperties: true,
};

const validators = {
  feedMatch: feedAjv.compile<FeedMatch>(feedMatchSchema),
  registration: formAjv.compile(registrationSchema),
  prediction: formAjv.compile(predictionSchema),
};

/**
 * Format ajv validation errors into field-specific error details
 */
export function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    const missingProperty = typeof error.params.missingProperty === 'string'
      ? error.params.missingProperty
      : undefined;
    const field = error.instancePath ? error.instancePath.substring(1) : missingProperty || 'body';

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = `Missing required field: ${missingProperty}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${String(error.params.type)}`;
    } else if (error.keyword === 'enum') {
      message = 'Must be one of HOME, DRAW, AWAY';
    } else if (error.keyword === 'minimum') {
      message = `Must be >= ${String(error.params.limit)}`;
    } else if (error.keyword === 'maximum') {
      message = `Must be <= ${String(error.params.limit)}`;
    } else if (error.keyword === 'minLength' || error.keyword === 'maxLength') {
      message = 'Username must be 3-20 characters';
    }

    details[field] = message;
  }

  return details;
}

/**
 * Check whether a raw feed entry has the fields the normalizer reads
 */
export function isFeedMatch(value: unknown): value is FeedMatch {
  return validators.feedMatch(value);
}

/**
 * Describe why a raw feed entry was rejected
 */
export function describeFeedMatchErrors(value: unknown): Record<string, string> {
  validators.feedMatch(value);
  return formatValidationErrors(validators.feedMatch.errors ?? []);
}

/**
 * Validate a sign-up body. The username is trimmed first.
 *
 * @throws ValidationError with field-specific details if validation fails
 */
export function validateRegistration(body: Record<string, unknown>): RegistrationForm {
  const candidate = {
    ...body,
    username: typeof body.username === 'string' ? body.username.trim() : body.username,
  };

  if (!validators.registration(candidate)) {
    throw new ValidationError(
      'Username must be 3-20 characters',
      formatValidationErrors(validators.registration.errors ?? [])
    );
  }

  return { username: candidate.username };
}

/**
 * Prediction after defaults are applied
 */
export interface ValidPrediction {
  match_id: number;
  outcome: MatchOutcome;
  home_goals: number;
  away_goals: number;
}

/**
 * Validate a prediction body, coercing form strings to integers
 *
 * @throws ValidationError with field-specific details if validation fails
 */
export function validatePrediction(body: Record<string, unknown>): ValidPrediction {
  // Blank form fields count as omitted
  const candidate: Record<string, unknown> = Object.fromEntries(
    Object.entries(body).filter(([, value]) => value !== '')
  );

  if (!validators.prediction(candidate)) {
    throw new ValidationError(
      'Invalid prediction',
      formatValidationErrors(validators.prediction.errors ?? [])
    );
  }

  return {
    match_id: candidate.match_id,
    outcome: candidate.outcome,
    home_goals: candidate.home_goals ?? 0,
    away_goals: candidate.away_goals ?? 0,
  };
}
