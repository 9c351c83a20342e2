import { optionalString, requireString } from '../utils/validators';

export interface LeadInput {
  name: string;
  email: string;
  phone?: string;
  message?: string;
}

export interface LeadAck {
  status: 'ok';
  message: string;
}

export const LEAD_ACK: LeadAck = {
  status: 'ok',
  message: 'We will contact you in 15 minutes.',
};

export function normalizeLeadInput(input: Partial<Record<keyof LeadInput, unknown>>): LeadInput {
  const lead: LeadInput = {
    name: requireString(input.name, 'name'),
    email: requireString(input.email, 'email'),
  };

  const phone = optionalString(input.phone, 'phone');
  const message = optionalString(input.message, 'message');

  if (phone !== undefined) lead.phone = phone;
  if (message !== undefined) lead.message = message;

  return lead;
}
