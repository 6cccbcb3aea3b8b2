/**
 * Main Lambda Handler Entry Point
 * 
 * Handles all API Gateway requests with cookie sessions, routing,
 * error handling, and structured logging. Pages are returned as JSON view
 * models; charts as SVG; form posts answer with redirects.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { handleError } from '../middleware/error-handler';
import { readSession, signSessionToken } from '../middleware/session';
import { BadRequestError } from '../models/errors';
import { SessionContext } from '../models/auth';
import { ErrorCode, HttpStatus, PageData } from '../models/response';
import {
  successResponse,
  svgResponse,
  redirectResponse,
  errorResponse,
  generateRequestId,
} from '../utils/response-formatter';
import {
  FOLLOWED_MATCHES_COOKIE,
  ONE_HOUR_SECONDS,
  ONE_YEAR_SECONDS,
  REFERRED_BY_COOKIE,
  SESSION_COOKIE,
  THEME_COOKIE,
  parseCookies,
  parseFollowedMatches,
  safeDecode,
  serializeCookie,
  toggleFollowedMatch,
} from '../utils/cookies';
import { logRequest } from '../utils/logger';
import { loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { Services, createServices } from '../services/service-container';

export const DEFAULT_THEME = 'dark';

export type ApiServices = Pick<Services, 'matchService' | 'predictionService' | 'sessionSecret'>;

/**
 * Everything a route needs about the current request
 */
interface RouteContext {
  event: APIGatewayProxyEvent;
  params: string[];
  cookies: Record<string, string>;
  theme: string;
  session: SessionContext | null;
  services: ApiServices;
  requestId: string;
}

type RouteHandler = (context: RouteContext) => Promise<APIGatewayProxyResult>;

interface Route {
  method: string;
  pathPattern: RegExp;
  handler: RouteHandler;
}

export const ABOUT_PAGE = {
  name: 'Momentum FC',
  description:
    'Live football momentum tracking: a pressure index per match, a short-term trend forecast and a prediction game.',
  data_source: 'football-data.org',
  refresh_interval_seconds: 60,
};

/**
 * Initialize services (singleton pattern for Lambda warm starts)
 */
let services: Services | null = null;

function getServices(): Services {
  if (!services) {
    const config = loadEnvironmentConfig();
    validateEnvironmentConfig(config);
    services = createServices(config);
  }
  return services;
}

function getHeader(event: APIGatewayProxyEvent, name: string): string | undefined {
  const headers = event.headers ?? {};
  const key = Object.keys(headers).find((header) => header.toLowerCase() === name.toLowerCase());
  return key ? headers[key] : undefined;
}

/**
 * Parse a numeric match id captured from the path
 */
function parseMatchId(raw: string | undefined): number {
  const matchId = Number(raw);
  if (!raw || !Number.isSafeInteger(matchId) || matchId <= 0) {
    throw new BadRequestError('Invalid match id');
  }
  return matchId;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON or urlencoded request body. An empty body is an empty form.
 */
function parseBody(event: APIGatewayProxyEvent): Record<string, unknown> {
  if (!event.body) {
    return {};
  }

  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  const contentType = (getHeader(event, 'Content-Type') ?? '').toLowerCase();

  if (contentType.includes('application/json')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new BadRequestError('Invalid JSON in request body');
    }
    if (!isRecord(parsed)) {
      throw new BadRequestError('Request body must be a JSON object');
    }
    return parsed;
  }

  return Object.fromEntries(new URLSearchParams(raw).entries());
}

function requestBaseUrl(event: APIGatewayProxyEvent): string {
  const host = getHeader(event, 'Host');
  if (!host) {
    return '';
  }
  const proto = getHeader(event, 'X-Forwarded-Proto') ?? 'https';
  return `${proto}://${host}`;
}

function refererOr(event: APIGatewayProxyEvent, fallback: string): string {
  return getHeader(event, 'Referer') || fallback;
}

function page<T extends object>(context: RouteContext, data: T): APIGatewayProxyResult {
  const payload: PageData<T> = { ...data, theme: context.theme };
  return successResponse(payload, HttpStatus.OK, context.requestId);
}

/**
 * Route handlers
 */

// GET /
async function getHome(context: RouteContext): Promise<APIGatewayProxyResult> {
  const apiStatus = await context.services.matchService.getPollStatus();
  return page(context, {
    api_status: apiStatus,
    username: context.session?.username ?? null,
  });
}

// GET /live
async function getLive(context: RouteContext): Promise<APIGatewayProxyResult> {
  const followed = parseFollowedMatches(context.cookies[FOLLOWED_MATCHES_COOKIE]);
  const live = await context.services.matchService.getLiveMatches(followed);
  return page(context, live);
}

// GET /match/{matchId}
async function getMatchDashboard(context: RouteContext): Promise<APIGatewayProxyResult> {
  const matchId = parseMatchId(context.params[0]);
  const followed = parseFollowedMatches(context.cookies[FOLLOWED_MATCHES_COOKIE]);
  const dashboard = await context.services.matchService.getDashboard(matchId, followed);
  return page(context, dashboard);
}

// GET /match/{matchId}/chart.svg
async function getMatchChart(context: RouteContext): Promise<APIGatewayProxyResult> {
  const matchId = parseMatchId(context.params[0]);
  return svgResponse(await context.services.matchService.getChart(matchId));
}

// GET /predict/{matchId}
async function getMatchAnalysis(context: RouteContext): Promise<APIGatewayProxyResult> {
  const matchId = parseMatchId(context.params[0]);
  const analysis = await context.services.matchService.getAnalysis(matchId);
  return page(context, analysis);
}

// GET /toggle-follow/{matchId}
async function toggleFollow(context: RouteContext): Promise<APIGatewayProxyResult> {
  const matchId = parseMatchId(context.params[0]);
  const followed = toggleFollowedMatch(
    parseFollowedMatches(context.cookies[FOLLOWED_MATCHES_COOKIE]),
    matchId
  );
  return redirectResponse(refererOr(context.event, '/live'), [
    serializeCookie(FOLLOWED_MATCHES_COOKIE, followed.join(','), { maxAgeSeconds: ONE_YEAR_SECONDS }),
  ]);
}

// GET /upcoming
async function getUpcoming(context: RouteContext): Promise<APIGatewayProxyResult> {
  const upcoming = await context.services.matchService.getUpcoming();
  return page(context, upcoming);
}

// GET /predict
async function getPredictPage(context: RouteContext): Promise<APIGatewayProxyResult> {
  const view = context.session
    ? await context.services.predictionService.getPredictionPage(
        context.session,
        requestBaseUrl(context.event)
      )
    : null;

  if (!view) {
    return page(context, { registered: false });
  }
  return page(context, { registered: true, ...view });
}

// POST /predict
async function postPredict(context: RouteContext): Promise<APIGatewayProxyResult> {
  const body = parseBody(context.event);
  const { predictionService, sessionSecret } = context.services;

  if (!context.session) {
    const user = await predictionService.register(body, context.cookies[REFERRED_BY_COOKIE] || null);
    const token = signSessionToken({ user_id: user.id, username: user.username }, sessionSecret);
    return redirectResponse('/predict', [
      serializeCookie(SESSION_COOKIE, token, { maxAgeSeconds: ONE_YEAR_SECONDS, httpOnly: true }),
    ]);
  }

  await predictionService.submitPrediction(context.session, body);
  return redirectResponse('/predict');
}

// GET /ref/{code}
async function enterReferral(context: RouteContext): Promise<APIGatewayProxyResult> {
  const code = safeDecode(context.params[0] ?? '');
  return redirectResponse('/predict', [
    serializeCookie(REFERRED_BY_COOKIE, code, { maxAgeSeconds: ONE_HOUR_SECONDS }),
  ]);
}

// GET /leaderboard
async function getLeaderboard(context: RouteContext): Promise<APIGatewayProxyResult> {
  const leaderboard = await context.services.predictionService.getLeaderboard(
    context.session?.username ?? null
  );
  return page(context, leaderboard);
}

// GET /about
async function getAbout(context: RouteContext): Promise<APIGatewayProxyResult> {
  return page(context, { about: ABOUT_PAGE });
}

// POST /set-theme
async function setTheme(context: RouteContext): Promise<APIGatewayProxyResult> {
  const body = parseBody(context.event);
  const theme = typeof body.theme === 'string' && /^[a-z-]{1,20}$/.test(body.theme)
    ? body.theme
    : DEFAULT_THEME;
  return redirectResponse(refererOr(context.event, '/'), [
    serializeCookie(THEME_COOKIE, theme, { maxAgeSeconds: ONE_YEAR_SECONDS }),
  ]);
}

/**
 * Route table
 * Patterns are tried in order; capture groups become route params
 */
const routes: Route[] = [
  { method: 'GET', pathPattern: /^\/$/, handler: getHome },
  { method: 'GET', pathPattern: /^\/live$/, handler: getLive },
  { method: 'GET', pathPattern: /^\/match\/(\d+)\/chart\.svg$/, handler: getMatchChart },
  { method: 'GET', pathPattern: /^\/match\/(\d+)$/, handler: getMatchDashboard },
  { method: 'GET', pathPattern: /^\/predict\/(\d+)$/, handler: getMatchAnalysis },
  { method: 'GET', pathPattern: /^\/toggle-follow\/(\d+)$/, handler: toggleFollow },
  { method: 'GET', pathPattern: /^\/upcoming$/, handler: getUpcoming },
  { method: 'GET', pathPattern: /^\/predict$/, handler: getPredictPage },
  { method: 'POST', pathPattern: /^\/predict$/, handler: postPredict },
  { method: 'GET', pathPattern: /^\/ref\/([^/]+)$/, handler: enterReferral },
  { method: 'GET', pathPattern: /^\/leaderboard$/, handler: getLeaderboard },
  { method: 'GET', pathPattern: /^\/about$/, handler: getAbout },
  { method: 'POST', pathPattern: /^\/set-theme$/, handler: setTheme },
];

/**
 * Find matching route for request
 */
function findRoute(method: string, path: string): { route: Route; params: string[] } | null {
  for (const route of routes) {
    if (route.method !== method) {
      continue;
    }
    const match = route.pathPattern.exec(path);
    if (match) {
      return { route, params: match.slice(1) };
    }
  }
  return null;
}

/**
 * Build the Lambda handler around a services factory
 * 
 * This handler:
 * 1. Generates a unique request_id for tracing
 * 2. Reads cookies and resolves the optional player session
 * 3. Routes requests based on HTTP method and path
 * 4. Handles errors and formats responses
 * 5. Logs all requests with structured logging
 */
export function createApiHandler(
  servicesFactory: () => ApiServices
): (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult> {
  return async (event) => {
    const startTime = Date.now();
    const requestId = generateRequestId();
    const method = event.httpMethod;
    const path = event.path;
    let userId: number | undefined;

    const finish = (result: APIGatewayProxyResult): APIGatewayProxyResult => {
      logRequest({
        requestId,
        method,
        path,
        userId,
        statusCode: result.statusCode,
        latencyMs: Date.now() - startTime,
      });
      return result;
    };

    try {
      // CORS preflight
      if (method === 'OPTIONS') {
        return finish(successResponse({}, HttpStatus.OK, requestId));
      }

      const found = findRoute(method, path);
      if (!found) {
        return finish(errorResponse(ErrorCode.NOT_FOUND, 'Route not found', undefined, requestId));
      }

      const apiServices = servicesFactory();
      const cookies = parseCookies(getHeader(event, 'Cookie'));
      const session = readSession(cookies[SESSION_COOKIE], apiServices.sessionSecret, requestId);
      userId = session?.user_id;

      const result = await found.route.handler({
        event,
        params: found.params,
        cookies,
        theme: cookies[THEME_COOKIE] || DEFAULT_THEME,
        session,
        services: apiServices,
        requestId,
      });

      return finish(result);
    } catch (error) {
      return finish(handleError(error, requestId));
    }
  };
}

export const handler = createApiHandler(getServices);
