import { Request, Response, NextFunction } from 'express';
import { LeadService } from '../services/lead.service';

export const createLeadController = (leads: LeadService) => ({
  submitDemoLead: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name, email, phone, message } = req.body;

      const ack = await leads.submitLead({ name, email, phone, message });

      res.json({
        success: true,
        ...ack,
      });
    } catch (error) {
      next(error);
    }
  },
});
