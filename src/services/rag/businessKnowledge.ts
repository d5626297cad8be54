import type {
  BusinessRecord,
  CatalogEntry,
  DocumentType,
  KnowledgeEntry,
  KnowledgeField,
  NewDocumentInput,
  ServiceRecord,
} from '../knowledge/types';
import { humanizeKey } from './textUtils';

/*
 * Structured business data is indexed as questions. Each generated document
 * holds one logical item (a service, a policy, an FAQ) and one entry per
 * question phrasing; the entry's answer is what retrieval surfaces.
 */

function entry(question: string, answer: string, metadata?: Record<string, unknown>): KnowledgeEntry {
  return metadata ? { question, answer, metadata } : { question, answer };
}

function draft(
  business: BusinessRecord,
  field: KnowledgeField,
  title: string,
  type: DocumentType,
  entries: KnowledgeEntry[],
  relatedServiceId?: string
): NewDocumentInput {
  return {
    businessId: business.id,
    title,
    type,
    originalContent: entries.map((item) => `Q: ${item.question}\nA: ${item.answer}`).join('\n\n'),
    sourceField: field,
    entries,
    relatedServiceId,
  };
}

function hasPrice(price: CatalogEntry['price']): price is number | string {
  return price !== undefined && price !== null && price !== '' && price !== 0;
}

export function formatCatalogPrice(price: number | string): string {
  const text = String(price).trim();
  if (/^free$/i.test(text) || text.startsWith('$')) {
    return text;
  }
  return `$${text}`;
}

function profileDocuments(business: BusinessRecord): NewDocumentInput[] {
  const { description, specialties, areasServed } = business.businessProfile;
  const documents: NewDocumentInput[] = [];

  if (description?.trim()) {
    const meta = { kind: 'description' };
    documents.push(
      draft(business, 'business_profile', 'Business description', 'general', [
        entry('What does your business do?', description, meta),
        entry('Tell me about your company', description, meta),
        entry('What services do you offer?', description, meta),
      ])
    );
  }

  if (specialties && specialties.length > 0) {
    const answer = `We specialize in ${specialties.join(', ')}.`;
    const meta = { kind: 'specialties', specialties };
    documents.push(
      draft(business, 'business_profile', 'Specialties', 'general', [
        entry('What are your specialties?', answer, meta),
        entry('What do you specialize in?', answer, meta),
      ])
    );
  }

  if (areasServed && areasServed.length > 0) {
    const areas = areasServed.join(', ');
    const meta = { kind: 'service_areas', areas: areasServed };
    documents.push(
      draft(business, 'business_profile', 'Service areas', 'general', [
        entry('What areas do you serve?', `We serve ${areas}.`, meta),
        entry('Where do you provide services?', `We cover ${areas}.`, meta),
        entry('What locations do you cover?', `We serve ${areas}.`, meta),
      ])
    );
  }

  return documents;
}

function catalogDocuments(business: BusinessRecord, services: ServiceRecord[]): NewDocumentInput[] {
  const serviceIdByName = new Map(services.map((service) => [service.name.trim().toLowerCase(), service.id]));

  return Object.entries(business.serviceCatalog).map(([serviceName, info]) => {
    const details: string[] = [];
    const description = info.description?.trim();
    if (description) {
      details.push(description);
    }
    const priceText = hasPrice(info.price) ? formatCatalogPrice(info.price) : undefined;
    if (priceText) {
      details.push(`Price: ${priceText}`);
    }
    if (info.duration) {
      details.push(`Duration: ${info.duration} minutes`);
    }
    // Stored answers must be non-blank, so a bare catalog entry still says something.
    const fullAnswer = details.length > 0 ? details.join('. ') : `We offer ${serviceName}.`;
    const offerAnswer = details.length > 0 ? `Yes, ${fullAnswer}` : `Yes, we offer ${serviceName}.`;
    const meta = { serviceName };

    const entries = [
      entry(`Tell me about your ${serviceName} service`, fullAnswer, meta),
      entry(`Do you offer ${serviceName}?`, offerAnswer, meta),
      entry(`What is ${serviceName}?`, fullAnswer, meta),
    ];
    if (priceText) {
      const priceMeta = { serviceName, price: info.price };
      entries.push(
        entry(`How much does ${serviceName} cost?`, `The ${serviceName} costs ${priceText}`, priceMeta),
        entry(`What is the price of ${serviceName}?`, priceText, priceMeta)
      );
    }

    return draft(
      business,
      'service_catalog',
      `Service: ${serviceName}`,
      'general',
      entries,
      serviceIdByName.get(serviceName.trim().toLowerCase())
    );
  });
}

function policyDocuments(business: BusinessRecord): NewDocumentInput[] {
  return Object.entries(business.conversationPolicies).flatMap(([policyKey, policyValue]) => {
    if (typeof policyValue !== 'string' || !policyValue.trim()) {
      return [];
    }
    const policyName = humanizeKey(policyKey);
    const meta = { policyKey };
    return [
      draft(business, 'conversation_policies', `Policy: ${policyName}`, 'policy', [
        entry(`What is your ${policyName}?`, policyValue, meta),
        entry(`Can you explain your ${policyName}?`, policyValue, meta),
        entry(`Tell me about your ${policyName}`, policyValue, meta),
      ]),
    ];
  });
}

function quickResponseDocuments(business: BusinessRecord): NewDocumentInput[] {
  return Object.entries(business.quickResponses).flatMap(([question, answer]) => {
    if (!question.trim() || typeof answer !== 'string' || !answer.trim()) {
      return [];
    }
    return [draft(business, 'quick_responses', `FAQ: ${question.trim()}`, 'faq', [entry(question.trim(), answer)])];
  });
}

function contactDocuments(business: BusinessRecord): NewDocumentInput[] {
  const contact = business.contactInfo;
  const address = contact.address?.trim();
  const email = contact.email?.trim();
  const website = contact.website?.trim();
  const officePhone = contact.officePhone?.trim();
  const emergencyLine = contact.emergencyLine?.trim();
  const entries: KnowledgeEntry[] = [];

  if (address) {
    entries.push(
      entry('What is your address?', address, { kind: 'address' }),
      entry('Where are you located?', address, { kind: 'address' })
    );
  }
  if (email) {
    entries.push(
      entry('What is your email?', email, { kind: 'email' }),
      entry('How can I email you?', `You can reach us at ${email}`, { kind: 'email' })
    );
  }
  if (website) {
    entries.push(entry('What is your website?', website, { kind: 'website' }));
  }
  if (officePhone) {
    entries.push(
      entry('What is your phone number?', officePhone, { kind: 'phone' }),
      entry('How can I call you?', `You can reach us at ${officePhone}`, { kind: 'phone' })
    );
  }
  if (emergencyLine) {
    entries.push(
      entry('Do you have an emergency contact?', `Yes, our emergency line is ${emergencyLine}`, { kind: 'emergency' })
    );
  }

  const methods: string[] = [];
  if (officePhone) {
    methods.push(`call us at ${officePhone}`);
  }
  if (email) {
    methods.push(`email ${email}`);
  }
  if (website) {
    methods.push(`visit ${website}`);
  }
  if (methods.length > 0) {
    entries.push(entry('How can I contact you?', `You can ${methods.join(', ')}`, { kind: 'general_contact' }));
  }

  return entries.length > 0 ? [draft(business, 'contact_info', 'Contact information', 'general', entries)] : [];
}

function instructionDocuments(business: BusinessRecord): NewDocumentInput[] {
  const instructions = business.aiInstructions.trim();
  if (!instructions) {
    return [];
  }
  return [
    draft(business, 'ai_instructions', 'Customer handling instructions', 'guide', [
      entry('Are there any special instructions for handling customers?', instructions, { kind: 'instructions' }),
    ]),
  ];
}

/**
 * Deterministic: the same business data always yields the same documents in
 * the same order.
 */
export function buildFieldDocuments(
  business: BusinessRecord,
  field: KnowledgeField,
  services: ServiceRecord[] = []
): NewDocumentInput[] {
  switch (field) {
    case 'business_profile':
      return profileDocuments(business);
    case 'service_catalog':
      return catalogDocuments(business, services);
    case 'conversation_policies':
      return policyDocuments(business);
    case 'quick_responses':
      return quickResponseDocuments(business);
    case 'contact_info':
      return contactDocuments(business);
    case 'ai_instructions':
      return instructionDocuments(business);
  }
}
