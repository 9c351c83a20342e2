import { ValidationError } from '../../src/middleware/errorHandler';
import { LeadInput } from '../../src/models/lead';
import { createLeadService } from '../../src/services/lead.service';
import { MemoryDocumentStore } from '../fixtures/memoryDocumentStore';

describe('LeadService', () => {
  let store: MemoryDocumentStore;

  beforeEach(() => {
    store = new MemoryDocumentStore();
  });

  it('should store the lead and acknowledge it', async () => {
    const ack = await createLeadService(store).submitLead({
      name: 'Test Lead',
      email: 'lead@example.com',
      phone: '+10000000000',
      message: 'Interested in bulk licences',
    });

    expect(ack).toEqual({ status: 'ok', message: 'We will contact you in 15 minutes.' });

    const [stored] = await store.find('lead');
    expect(stored).toMatchObject({
      name: 'Test Lead',
      email: 'lead@example.com',
      phone: '+10000000000',
      message: 'Interested in bulk licences',
    });
  });

  it('should store a lead without optional fields', async () => {
    await createLeadService(store).submitLead({ name: 'Test Lead', email: 'lead@example.com' });

    const [stored] = await store.find('lead');
    expect(stored.phone).toBeUndefined();
    expect(stored.message).toBeUndefined();
  });

  it('should reject a lead without an email', async () => {
    const input: LeadInput = { name: 'Test Lead', email: '' };

    await expect(createLeadService(store).submitLead(input)).rejects.toBeInstanceOf(ValidationError);
    expect(store.count('lead')).toBe(0);
  });
});
