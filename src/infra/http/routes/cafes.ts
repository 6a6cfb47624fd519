import { Router, type Response } from 'express';
import { AddCommentUseCase } from '../../../application/cafes/addComment.js';
import { CreateCafeUseCase } from '../../../application/cafes/createCafe.js';
import { DeleteCafeUseCase } from '../../../application/cafes/deleteCafe.js';
import { EditCafeUseCase } from '../../../application/cafes/editCafe.js';
import { CafeQueries, type CafeWithComments } from '../../../application/cafes/queries.js';
import { DuplicateCafeNameError } from '../../../application/errors.js';
import type { Actor } from '../../../domain/auth/user.js';
import type { Cafe } from '../../../domain/cafes/cafe.js';
import { canEditCafe, isSuperAdmin } from '../../../domain/cafes/policy.js';
import { CafeRepo } from '../../db/cafeRepo.js';
import { CommentRepo } from '../../db/commentRepo.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { setFlash } from '../middleware/flash.js';
import { currentActor, requireLogin } from '../middleware/session.js';
import {
  cafeFormSchema,
  commentFormSchema,
  echoValues,
  parseForm,
  parseId,
  type FormErrors,
} from '../forms.js';

const CAFE_FIELDS = ['name', 'summary', 'rating', 'body', 'imgUrl', 'contributorName'] as const;

export interface CafeRoutesOptions {
  cafeRepo: CafeRepo;
  commentRepo: CommentRepo;
  superAdminId: number;
  now?: () => Date;
}

function cafeValues(cafe: Cafe): Record<string, string> {
  return {
    name: cafe.name,
    summary: cafe.summary,
    rating: String(cafe.rating),
    body: cafe.body,
    imgUrl: cafe.imgUrl ?? '',
    contributorName: cafe.contributorName,
  };
}

export function createCafeRoutes({ cafeRepo, commentRepo, superAdminId, now }: CafeRoutesOptions) {
  const router = Router();
  const queries = new CafeQueries(cafeRepo, commentRepo);
  const createCafeUseCase = new CreateCafeUseCase(cafeRepo, now);
  const editCafeUseCase = new EditCafeUseCase(cafeRepo, superAdminId);
  const deleteCafeUseCase = new DeleteCafeUseCase(cafeRepo, superAdminId);
  const addCommentUseCase = new AddCommentUseCase(cafeRepo, commentRepo);

  function renderCafe(
    res: Response,
    actor: Actor | null,
    { cafe, comments }: CafeWithComments,
    form: { values: Record<string, string>; errors: FormErrors } = { values: {}, errors: {} },
    status = 200
  ): void {
    res.status(status).render('cafe', {
      cafe,
      comments,
      canEdit: canEditCafe(actor, cafe, superAdminId),
      canDelete: isSuperAdmin(actor, superAdminId),
      ...form,
    });
  }

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const cafes = await queries.listCafes();
      res.render('index', {
        cafes,
        canDelete: isSuperAdmin(currentActor(req), superAdminId),
      });
    })
  );

  router.get(
    '/cafe/:id',
    asyncHandler(async (req, res) => {
      const details = await queries.getCafe(parseId(req.params.id));
      renderCafe(res, currentActor(req), details);
    })
  );

  router.post(
    '/cafe/:id',
    asyncHandler(async (req, res) => {
      const actor = currentActor(req);
      const details = await queries.getCafe(parseId(req.params.id));

      const form = parseForm(commentFormSchema, req.body);
      if (!form.success) {
        renderCafe(
          res,
          actor,
          details,
          { values: echoValues(req.body, ['text']), errors: form.errors },
          400
        );
        return;
      }

      // A valid comment from an anonymous visitor is dropped, not stored
      if (!actor) {
        setFlash(res, 'You need to login or register to comment.');
        res.redirect('/login');
        return;
      }

      await addCommentUseCase.execute({ actor, cafeId: details.cafe.id, text: form.data.text });
      res.redirect(`/cafe/${details.cafe.id}`);
    })
  );

  router.get('/new-cafe', requireLogin, (_req, res) => {
    res.render('cafe-form', { isEdit: false, values: {}, errors: {} });
  });

  router.post(
    '/new-cafe',
    requireLogin,
    asyncHandler(async (req, res) => {
      const actor = currentActor(req);
      if (!actor) {
        res.redirect('/login');
        return;
      }

      const form = parseForm(cafeFormSchema, req.body);
      if (!form.success) {
        res.status(400).render('cafe-form', {
          isEdit: false,
          values: echoValues(req.body, CAFE_FIELDS),
          errors: form.errors,
        });
        return;
      }

      try {
        await createCafeUseCase.execute({ actor, cafe: form.data });
        res.redirect('/');
      } catch (error) {
        if (error instanceof DuplicateCafeNameError) {
          setFlash(res, error.message);
          res.redirect('/new-cafe');
          return;
        }
        throw error;
      }
    })
  );

  router.get(
    '/edit-cafe/:id',
    requireLogin,
    asyncHandler(async (req, res) => {
      const cafe = await editCafeUseCase.load(currentActor(req), parseId(req.params.id));
      res.render('cafe-form', { isEdit: true, cafe, values: cafeValues(cafe), errors: {} });
    })
  );

  router.post(
    '/edit-cafe/:id',
    requireLogin,
    asyncHandler(async (req, res) => {
      const actor = currentActor(req);
      if (!actor) {
        res.redirect('/login');
        return;
      }
      const cafe = await editCafeUseCase.load(actor, parseId(req.params.id));

      const form = parseForm(cafeFormSchema, req.body);
      if (!form.success) {
        res.status(400).render('cafe-form', {
          isEdit: true,
          cafe,
          values: echoValues(req.body, CAFE_FIELDS),
          errors: form.errors,
        });
        return;
      }

      try {
        await editCafeUseCase.execute({ actor, cafeId: cafe.id, cafe: form.data });
        res.redirect(`/cafe/${cafe.id}`);
      } catch (error) {
        if (error instanceof DuplicateCafeNameError) {
          setFlash(res, error.message);
          res.redirect(`/edit-cafe/${cafe.id}`);
          return;
        }
        throw error;
      }
    })
  );

  router.get(
    '/delete/:id',
    asyncHandler(async (req, res) => {
      await deleteCafeUseCase.execute(currentActor(req), parseId(req.params.id));
      res.redirect('/');
    })
  );

  return router;
}
