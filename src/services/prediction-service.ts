/**
 * Prediction Service
 * 
 * Business logic of the prediction mini-game: registration with referral
 * bonus, prediction submission, the prediction page, leaderboard and the
 * scoring of finished matches.
 */

import { Repositories, UnitOfWork } from '../repositories/unit-of-work';
import { PredictionStore } from '../repositories/prediction-repository';
import { UserStore, REFERRAL_CODE_CONSTRAINT } from '../repositories/user-repository';
import { ConflictError, NotFoundError, BadRequestError } from '../models/errors';
import { MatchState, PREDICTABLE_MATCH_STATUSES } from '../models/match';
import { LeaderboardEntry, Prediction, User } from '../models/user';
import { SessionContext } from '../models/auth';
import { validatePrediction, validateRegistration } from '../utils/payload-validation';
import { generateReferralCode } from '../utils/referral-code';
import { REFERRAL_BONUS_POINTS, scorePrediction } from '../utils/prediction-scoring';
import { log, LogLevel } from '../utils/logger';

export const LEADERBOARD_SIZE = 50;

// Attempts at drawing an unused referral code before giving up
const REFERRAL_CODE_ATTEMPTS = 3;

export interface PredictionPageView {
  user: User;
  matches: MatchState[];
  ref_link: string;
}

export interface LeaderboardView {
  users: LeaderboardEntry[];
  current_username: string | null;
}

/**
 * Score every pending prediction whose match is FINISHED
 * 
 * @returns Number of predictions scored
 */
export async function scorePendingPredictions(
  predictions: PredictionStore,
  users: UserStore
): Promise<number> {
  const pending = await predictions.findPendingForFinished();

  for (const prediction of pending) {
    const points = scorePrediction(
      {
        outcome: prediction.predicted_outcome,
        homeGoals: prediction.predicted_home_goals,
        awayGoals: prediction.predicted_away_goals,
      },
      { homeGoals: prediction.actual_home, awayGoals: prediction.actual_away }
    );

    await predictions.markScored(prediction.prediction_id, points);
    await users.addPoints(prediction.user_id, points);
  }

  return pending.length;
}

export class PredictionService {
  constructor(
    private repositories: Repositories,
    private unitOfWork: UnitOfWork,
    private publicBaseUrl: string
  ) {}

  /**
   * Register a player, crediting the referrer when the referral code is known
   * 
   * @param body - Raw form body with `username`
   * @param referredByCode - Value of the referred_by cookie, if any
   * @throws ValidationError if the username is not 3-20 characters
   * @throws ConflictError if the username is taken
   */
  async register(body: Record<string, unknown>, referredByCode: string | null): Promise<User> {
    const { username } = validateRegistration(body);

    const user = await this.unitOfWork(async (repositories) => {
      const created = await this.createUserWithFreshCode(repositories, username, referredByCode);

      if (referredByCode) {
        const referrer = await repositories.users.findByReferralCode(referredByCode);
        if (referrer) {
          await repositories.users.addPoints(referrer.id, REFERRAL_BONUS_POINTS);
          await repositories.referrals.create(referrer.id, created.id, REFERRAL_BONUS_POINTS);
        }
      }

      return created;
    });

    log(LogLevel.INFO, 'Player registered', {
      user_id: user.id,
      referred: referredByCode !== null,
      operation: 'register',
    });

    return user;
  }

  private async createUserWithFreshCode(
    repositories: Repositories,
    username: string,
    referredByCode: string | null
  ): Promise<User> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await repositories.users.create({
          username,
          referral_code: generateReferralCode(),
          referred_by_code: referredByCode,
        });
      } catch (error) {
        const codeCollision = error instanceof ConflictError && error.constraint === REFERRAL_CODE_CONSTRAINT;
        if (!codeCollision || attempt >= REFERRAL_CODE_ATTEMPTS) {
          throw error;
        }
      }
    }
  }

  /**
   * Store a prediction for the signed-in player
   * 
   * @throws ValidationError for a malformed body
   * @throws NotFoundError if the match does not exist
   * @throws BadRequestError if the match is closed or already predicted
   */
  async submitPrediction(session: SessionContext, body: Record<string, unknown>): Promise<Prediction> {
    const form = validatePrediction(body);

    const match = await this.repositories.matches.findById(form.match_id);
    if (!match) {
      throw new NotFoundError('Match not found');
    }
    if (!PREDICTABLE_MATCH_STATUSES.some((status) => status === match.status)) {
      throw new BadRequestError('Predictions are closed for this match');
    }

    return this.repositories.predictions.create({
      user_id: session.user_id,
      match_id: form.match_id,
      predicted_outcome: form.outcome,
      predicted_home_goals: form.home_goals,
      predicted_away_goals: form.away_goals,
    });
  }

  /**
   * Data for the signed-in prediction page, or null when the session
   * points at a player that no longer exists
   * 
   * @param requestBaseUrl - Origin of the current request, used for the
   * referral link when no public base URL is configured
   */
  async getPredictionPage(
    session: SessionContext,
    requestBaseUrl: string = ''
  ): Promise<PredictionPageView | null> {
    const user = await this.repositories.users.findById(session.user_id);
    if (!user) {
      return null;
    }

    const [matches, predictedIds] = await Promise.all([
      this.repositories.matches.findPredictable(),
      this.repositories.predictions.findMatchIdsByUser(user.id),
    ]);
    const predicted = new Set(predictedIds);

    return {
      user,
      matches: matches.filter((match) => !predicted.has(match.id)),
      ref_link: `${(this.publicBaseUrl || requestBaseUrl).replace(/\/+$/, '')}/ref/${user.referral_code}`,
    };
  }

  async getLeaderboard(currentUsername: string | null): Promise<LeaderboardView> {
    return {
      users: await this.repositories.users.leaderboard(LEADERBOARD_SIZE),
      current_username: currentUsername,
    };
  }

  /**
   * Score finished matches in one transaction
   */
  async scorePredictions(): Promise<number> {
    return this.unitOfWork((repositories) =>
      scorePendingPredictions(repositories.predictions, repositories.users)
    );
  }
}
