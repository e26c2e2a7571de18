import { BusinessProfile } from '../config/datasets';

const BASE_PROMPT = `You are a friendly, professional furniture sales and repair concierge. You help customers find furniture, estimate repair costs, and leave their details for follow-up.

RULES:
- Use lookup_product for any product, size, color, or price question. Never invent products, prices, or stock.
- House-brand items are our own line; partner-line items are sourced from a partner. Say which is which.
- All prices are in USD. Partner-line prices were converted from SAR.
- Use estimate_repair for repair questions. Quote every tier as a range (price and days), never a single number.
- If estimate_repair returns NotFound, say plainly that you cannot provide an estimate without an inspection.
- When a customer shares name, email and what they want, call record_customer_interest.
- If you cannot answer a question, call record_feedback with the question.
- After a completed purchase, repair, or delivery, offer to take feedback with record_service_feedback.
- Ask one question at a time and keep replies short.

TONE: Warm, knowledgeable, never pushy.`;

export interface PromptContext {
  /** Issue types the repair rule table covers. */
  repairIssues?: string[];
}

export function buildSystemPrompt(business?: BusinessProfile | null, context?: PromptContext | null): string {
  const parts: string[] = [BASE_PROMPT];

  if (business) {
    const businessSection: string[] = [`You work at ${business.name}${business.tagline ? `, ${business.tagline}` : ''}.`];

    if (business.location) {
      businessSection.push(`Location: ${business.location}.`);
    }
    if (business.hours) {
      businessSection.push(`Business hours: ${business.hours}.`);
    }
    if (business.phone) {
      businessSection.push(`Phone: ${business.phone}`);
    }
    if (business.services.length > 0) {
      businessSection.push(`Services:\n${business.services.map((s) => `- ${s}`).join('\n')}`);
    }
    if (business.policies.length > 0) {
      businessSection.push(`Policies:\n${business.policies.map((p) => `- ${p}`).join('\n')}`);
    }

    parts.push(`\nBUSINESS INFO:\n${businessSection.join('\n')}`);
  }

  if (context?.repairIssues && context.repairIssues.length > 0) {
    parts.push(`\nREPAIR ISSUES WE PRICE:\n${context.repairIssues.join(', ')}`);
  }

  return parts.join('\n');
}

/** Reply used when the reasoning backend cannot be reached for a turn. */
export function buildFallbackReply(lastMessage: string): string {
  const text = lastMessage.toLowerCase();

  if (['repair', 'fix', 'broken', 'scratch', 'crack', 'wobbl'].some((kw) => text.includes(kw))) {
    return "Sorry, I can't pull up repair estimates right this moment. Could you try again shortly? You can also leave your name and email and we'll follow up.";
  }

  if (['price', 'cost', 'how much', 'stock', 'available'].some((kw) => text.includes(kw))) {
    return "Sorry, I can't check our catalog right this moment. Please try again in a minute and I'll look that up for you.";
  }

  return "Sorry, I'm having trouble responding right now. Please send your message again in a moment.";
}
