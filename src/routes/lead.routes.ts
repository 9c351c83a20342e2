import { Router } from 'express';
import { body } from 'express-validator';
import { createLeadController } from '../controllers/lead.controller';
import { validate } from '../middleware/validate';
import { LeadService } from '../services/lead.service';

export const createLeadRoutes = (leads: LeadService): Router => {
  const router = Router();
  const leadController = createLeadController(leads);

  router.post(
    '/',
    [
      body('name').isString().notEmpty(),
      body('email').isString().notEmpty(),
      body('phone').optional({ values: 'null' }).isString(),
      body('message').optional({ values: 'null' }).isString(),
    ],
    validate,
    leadController.submitDemoLead
  );

  return router;
};
