import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { SessionEngine } from '../../../shared/src/services/sessionEngine';
import { Session, SessionState } from '../../../shared/src/types';
import { isAllowedEmailDomain } from '../../../shared/src/utils';
import { Logger } from '../../../shared/src/utils/logger';
import { toError } from '../../../shared/src/utils/errors';
import { Mailer } from '../services/mailer';
import { SessionParams, validateCode, validateEmail, validateSessionParams } from '../services/validationService';
import { StartFormError, isStartFormError, startPage, verifyPage } from '../views/pages';
import { notFoundHandler } from '../middleware/errorHandler';

export interface VerificationRouterOptions {
  engine: SessionEngine;
  mailer: Mailer;
  logger: Logger;
  allowedEmailDomain: string;
  formRateLimiter: RequestHandler;
}

type SessionHandler = (req: Request, res: Response, params: SessionParams) => Promise<void>;

const notFound = notFoundHandler();

export function startPath({ userId, secondaryId }: SessionParams): string {
  return `/start/${userId}/${secondaryId}`;
}

export function verifyPath({ userId, secondaryId }: SessionParams): string {
  return `/verify/${userId}/${secondaryId}`;
}

// Route parameters that fail validation look exactly like an unknown session
function withSession(handler: SessionHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const params = validateSessionParams(req.params);
    if (!params) {
      notFound(req, res, next);
      return;
    }
    handler(req, res, params).catch(next);
  };
}

/**
 * Where a session in this state belongs, if not on the email form
 */
function stateRedirect(session: Session, params: SessionParams): string | null {
  switch (session.state) {
    case SessionState.AwaitingCode:
      return verifyPath(params);
    case SessionState.Verified:
      return '/success';
    case SessionState.Failed:
      return '/failure';
    case SessionState.AwaitingStart:
      return null;
  }
}

export function createVerificationRouter(options: VerificationRouterOptions): Router {
  const { engine, mailer, logger, allowedEmailDomain, formRateLimiter } = options;
  const router = Router();

  const redirectToStart = (res: Response, params: SessionParams, error: StartFormError) => {
    res.redirect(303, `${startPath(params)}?error=${error}`);
  };

  router.get('/start/:userId/:secondaryId', withSession(async (req, res, params) => {
    const session = await engine.lookup(params.userId, params.secondaryId);
    if (!session) {
      notFound(req, res, () => undefined);
      return;
    }

    const redirect = stateRedirect(session, params);
    if (redirect) {
      res.redirect(303, redirect);
      return;
    }

    const error = isStartFormError(req.query.error) ? req.query.error : undefined;
    res.type('html').send(startPage(allowedEmailDomain, error));
  }));

  router.post('/start/:userId/:secondaryId', formRateLimiter, withSession(async (req, res, params) => {
    const session = await engine.lookup(params.userId, params.secondaryId);
    if (!session) {
      notFound(req, res, () => undefined);
      return;
    }

    const redirect = stateRedirect(session, params);
    if (redirect) {
      res.redirect(303, redirect);
      return;
    }

    const email = validateEmail(req.body?.email);
    if (!email) {
      redirectToStart(res, params, 'email');
      return;
    }

    if (!isAllowedEmailDomain(email, allowedEmailDomain)) {
      logger.info('Rejected email outside the allowed domain', { userId: session.userId });
      redirectToStart(res, params, 'domain');
      return;
    }

    logger.info(`User ${session.displayName} with id ${session.userId} sent an email`);
    try {
      await mailer.send(email, session.verificationCode, session.displayName);
    } catch (error) {
      logger.error('Failed to send verification email', toError(error), { userId: session.userId });
      redirectToStart(res, params, 'mail');
      return;
    }

    const marked = await engine.markEmailSent(params.userId, params.secondaryId);
    if (marked === 'not_found') {
      notFound(req, res, () => undefined);
      return;
    }

    res.redirect(303, verifyPath(params));
  }));

  router.get('/verify/:userId/:secondaryId', withSession(async (req, res, params) => {
    const session = await engine.lookup(params.userId, params.secondaryId);
    if (!session) {
      notFound(req, res, () => undefined);
      return;
    }

    if (session.state === SessionState.Verified) {
      res.redirect(303, '/success');
      return;
    }

    if (session.remainingAttempts <= 0) {
      res.redirect(303, '/failure');
      return;
    }

    res.type('html').send(verifyPage(session.remainingAttempts));
  }));

  router.post('/verify/:userId/:secondaryId', formRateLimiter, withSession(async (req, res, params) => {
    // A malformed code still costs an attempt
    const attemptedCode = validateCode(req.body?.verification) ?? '';
    const result = await engine.verify(params.userId, params.secondaryId, attemptedCode);

    switch (result.kind) {
      case 'verified':
        res.redirect(303, '/success');
        return;
      case 'attempts_remaining':
        res.redirect(303, result.remaining === 0 ? '/failure' : verifyPath(params));
        return;
      case 'not_found':
        notFound(req, res, () => undefined);
        return;
    }
  }));

  return router;
}
