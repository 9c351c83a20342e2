import { DocumentStore } from '../lib/documentStore';
import { logger } from '../utils/logger';
import { LEAD_ACK, LeadAck, LeadInput, normalizeLeadInput } from '../models/lead';

export interface LeadService {
  submitLead(input: LeadInput): Promise<LeadAck>;
}

export const createLeadService = (store: DocumentStore): LeadService => ({
  async submitLead(input) {
    const lead = normalizeLeadInput(input);
    const id = await store.create('lead', lead);
    logger.info('Demo lead stored', { leadId: id });
    return { ...LEAD_ACK };
  },
});
