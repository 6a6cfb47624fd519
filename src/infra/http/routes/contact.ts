import { Router } from 'express';
import { ContactRelay } from '../../mail/contactRelay.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { contactFormSchema, echoValues, parseForm } from '../forms.js';

const CONTACT_FIELDS = ['name', 'email', 'phone', 'message'] as const;

export function createContactRoutes(relay: ContactRelay) {
  const router = Router();

  router.get('/contact', (_req, res) => {
    res.render('contact', { status: 'idle', values: {}, errors: {} });
  });

  router.post(
    '/contact',
    asyncHandler(async (req, res) => {
      const form = parseForm(contactFormSchema, req.body);
      if (!form.success) {
        res.status(400).render('contact', {
          status: 'idle',
          values: echoValues(req.body, CONTACT_FIELDS),
          errors: form.errors,
        });
        return;
      }

      const result = await relay.send(form.data);
      if (result.ok) {
        res.render('contact', { status: 'sent', values: {}, errors: {} });
        return;
      }

      res.status(502).render('contact', {
        status: 'failed',
        values: echoValues(req.body, CONTACT_FIELDS),
        errors: {},
      });
    })
  );

  return router;
}
