import { Router, type RequestHandler } from 'express';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { DuplicateEmailError, UnauthorizedError } from '../../../application/errors.js';
import { UserRepo } from '../../db/userRepo.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { setFlash } from '../middleware/flash.js';
import { clearSession, issueSession, type SessionOptions } from '../middleware/session.js';
import { echoValues, loginFormSchema, parseForm, registerFormSchema } from '../forms.js';

export interface AuthRoutesOptions {
  userRepo: UserRepo;
  session: SessionOptions;
  loginRateLimiter: RequestHandler;
}

export function createAuthRoutes({ userRepo, session, loginRateLimiter }: AuthRoutesOptions) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(userRepo);
  const loginUseCase = new LoginUseCase(userRepo);

  router.get('/register', (_req, res) => {
    res.render('register', { values: {}, errors: {} });
  });

  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const form = parseForm(registerFormSchema, req.body);
      if (!form.success) {
        res.status(400).render('register', {
          values: echoValues(req.body, ['email', 'name']),
          errors: form.errors,
        });
        return;
      }

      try {
        const actor = await registerUseCase.execute(form.data);
        issueSession(res, actor, session);
        res.redirect('/');
      } catch (error) {
        if (error instanceof DuplicateEmailError) {
          setFlash(res, error.message);
          res.redirect('/login');
          return;
        }
        throw error;
      }
    })
  );

  router.get('/login', (_req, res) => {
    res.render('login', { values: {}, errors: {} });
  });

  router.post(
    '/login',
    loginRateLimiter,
    asyncHandler(async (req, res) => {
      const form = parseForm(loginFormSchema, req.body);
      if (!form.success) {
        res.status(400).render('login', {
          values: echoValues(req.body, ['email']),
          errors: form.errors,
        });
        return;
      }

      try {
        const actor = await loginUseCase.execute(form.data);
        issueSession(res, actor, session);
        res.redirect('/');
      } catch (error) {
        if (error instanceof UnauthorizedError) {
          setFlash(res, error.message);
          res.redirect('/login');
          return;
        }
        throw error;
      }
    })
  );

  router.get('/logout', (_req, res) => {
    clearSession(res, session);
    res.redirect('/');
  });

  return router;
}
