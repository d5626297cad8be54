import { describe, expect, it } from 'vitest';
import { KnowledgeDocument } from '../../models/KnowledgeDocument';
import { KNOWLEDGE_FIELDS, type BusinessRecord, type ServiceRecord } from '../knowledge/types';
import { buildFieldDocuments, formatCatalogPrice } from './businessKnowledge';

function business(overrides: Partial<BusinessRecord> = {}): BusinessRecord {
  return {
    id: 'biz-1',
    name: 'Acme Salon',
    isActive: true,
    businessProfile: {},
    serviceCatalog: {},
    conversationPolicies: {},
    quickResponses: {},
    contactInfo: {},
    aiInstructions: '',
    ...overrides,
  };
}

const services: ServiceRecord[] = [
  { id: 'svc-1', businessId: 'biz-1', name: 'Haircut', isActive: true, displayOrder: 0 },
];

describe('formatCatalogPrice', () => {
  it('adds a dollar sign unless the price already reads as one', () => {
    expect(formatCatalogPrice(30)).toBe('$30');
    expect(formatCatalogPrice('25.50')).toBe('$25.50');
    expect(formatCatalogPrice('$45')).toBe('$45');
    expect(formatCatalogPrice('free')).toBe('free');
  });
});

describe('buildFieldDocuments', () => {
  it('builds one document per catalog service linked to the matching service', () => {
    const documents = buildFieldDocuments(
      business({
        serviceCatalog: {
          Haircut: { description: 'Classic cut', price: 30, duration: 30 },
          Consultation: { price: 'Free' },
        },
      }),
      'service_catalog',
      services
    );

    expect(documents.map((doc) => [doc.title, doc.type, doc.relatedServiceId])).toEqual([
      ['Service: Haircut', 'general', 'svc-1'],
      ['Service: Consultation', 'general', undefined],
    ]);

    const haircut = documents[0];
    expect(haircut?.sourceField).toBe('service_catalog');
    expect(haircut?.entries?.map((entry) => entry.question)).toEqual([
      'Tell me about your Haircut service',
      'Do you offer Haircut?',
      'What is Haircut?',
      'How much does Haircut cost?',
      'What is the price of Haircut?',
    ]);
    expect(haircut?.entries?.[0]?.answer).toBe('Classic cut. Price: $30. Duration: 30 minutes');
    expect(haircut?.entries?.[3]).toEqual({
      question: 'How much does Haircut cost?',
      answer: 'The Haircut costs $30',
      metadata: { serviceName: 'Haircut', price: 30 },
    });

    expect(documents[1]?.entries?.[1]?.answer).toBe('Yes, Price: Free');
  });

  it('turns quick responses into FAQ documents', () => {
    const [faq, ...rest] = buildFieldDocuments(
      business({ quickResponses: { 'What are your hours?': '9-5 Mon-Fri.' } }),
      'quick_responses'
    );

    expect(rest).toEqual([]);
    expect(faq).toEqual({
      businessId: 'biz-1',
      title: 'FAQ: What are your hours?',
      type: 'faq',
      originalContent: 'Q: What are your hours?\nA: 9-5 Mon-Fri.',
      sourceField: 'quick_responses',
      entries: [{ question: 'What are your hours?', answer: '9-5 Mon-Fri.' }],
      relatedServiceId: undefined,
    });
  });

  it('skips blank policies and humanizes policy keys', () => {
    const documents = buildFieldDocuments(
      business({ conversationPolicies: { cancellation_policy: '24 hours notice', empty_policy: '  ' } }),
      'conversation_policies'
    );

    expect(documents).toHaveLength(1);
    expect(documents[0]?.title).toBe('Policy: cancellation policy');
    expect(documents[0]?.type).toBe('policy');
    expect(documents[0]?.entries?.[0]?.question).toBe('What is your cancellation policy?');
  });

  it('collects contact details into one document', () => {
    const [contact] = buildFieldDocuments(
      business({ contactInfo: { officePhone: '555-0100', email: 'hello@example.com' } }),
      'contact_info'
    );

    expect(contact?.title).toBe('Contact information');
    expect(contact?.entries?.map((entry) => entry.question)).toEqual([
      'What is your email?',
      'How can I email you?',
      'What is your phone number?',
      'How can I call you?',
      'How can I contact you?',
    ]);
    expect(contact?.entries?.[4]?.answer).toBe('You can call us at 555-0100, email hello@example.com');
  });

  it('produces nothing for empty fields', () => {
    const empty = business();
    expect(buildFieldDocuments(empty, 'business_profile')).toEqual([]);
    expect(buildFieldDocuments(empty, 'contact_info')).toEqual([]);
    expect(buildFieldDocuments(empty, 'ai_instructions')).toEqual([]);
  });

  it('asks three questions about the business description', () => {
    const [profile] = buildFieldDocuments(
      business({ businessProfile: { description: 'We cut hair.' } }),
      'business_profile'
    );
    expect(profile?.title).toBe('Business description');
    expect(profile?.entries).toHaveLength(3);
    expect(profile?.entries?.every((entry) => entry.answer === 'We cut hair.')).toBe(true);
  });

  it('answers a catalog entry that has no details', () => {
    const [consultation] = buildFieldDocuments(
      business({ serviceCatalog: { Consultation: {}, Trim: { description: '  ' } } }),
      'service_catalog'
    );

    expect(consultation?.entries?.map((entry) => entry.answer)).toEqual([
      'We offer Consultation.',
      'Yes, we offer Consultation.',
      'We offer Consultation.',
    ]);
  });

  it('generates documents the knowledge document schema accepts for sparse business data', () => {
    const sparse = business({
      id: '64b000000000000000000001',
      businessProfile: { description: 'We cut hair.', specialties: ['Fades'] },
      serviceCatalog: { Consultation: {}, Trim: { description: '  ' }, Haircut: { price: 30 } },
      conversationPolicies: { cancellation_policy: '24 hours notice.', blank_policy: ' ' },
      quickResponses: { 'Is there parking?': 'Behind the shop.' },
      contactInfo: { address: '  ', email: 'hello@example.com' },
      aiInstructions: 'Be friendly.',
    });

    const drafts = KNOWLEDGE_FIELDS.flatMap((field) => buildFieldDocuments(sparse, field));
    expect(drafts).toHaveLength(9);
    for (const draft of drafts) {
      expect(new KnowledgeDocument(draft).validateSync()?.message).toBeUndefined();
    }

    const contact = drafts.find((draft) => draft.sourceField === 'contact_info');
    expect(contact?.entries?.map((entry) => entry.question)).toEqual([
      'What is your email?',
      'How can I email you?',
      'How can I contact you?',
    ]);
  });
});
