/**
 * Ordered keyword rule tables used to read a role's involvement narrative.
 *
 * A rule matches when any of its keywords occurs in the lower-cased text.
 * Keywords are stems ("disclos", "refus") so inflections match too.
 */
export interface KeywordRule<T> {
    readonly outcome: T;
    readonly keywords: readonly string[];
}

export function ruleMatches<T>(rule: KeywordRule<T>, text: string): boolean {
    const lowered = text.toLowerCase();
    return rule.keywords.some((keyword) => lowered.includes(keyword));
}

/**
 * Outcomes of every matching rule, in table order, without duplicates.
 */
export function matchAll<T>(rules: readonly KeywordRule<T>[], text: string): T[] {
    const outcomes: T[] = [];
    for (const rule of rules) {
        if (ruleMatches(rule, text) && !outcomes.includes(rule.outcome)) {
            outcomes.push(rule.outcome);
        }
    }
    return outcomes;
}

export function matchesAny(keywords: readonly string[], text: string): boolean {
    return ruleMatches({ outcome: true, keywords }, text);
}

// ─── Tables ──────────────────────────────────────────────

export const FALLBACK_MOTIVATION = 'Fulfil the responsibilities of the role';

export const MOTIVATION_RULES: readonly KeywordRule<string>[] = [
    { keywords: ['protect', 'safety'], outcome: 'Protect public safety and welfare' },
    { keywords: ['comply', 'standard'], outcome: 'Uphold professional standards and regulatory compliance' },
    { keywords: ['client', 'serve'], outcome: "Serve the client's legitimate interests" },
    { keywords: ['report', 'disclos'], outcome: 'Ensure honest and timely disclosure' },
    { keywords: ['cost', 'budget', 'profit'], outcome: 'Manage project cost and commercial pressure' },
];

export const GOAL_RULES: readonly KeywordRule<string>[] = [
    { keywords: ['protect', 'safety'], outcome: 'Prevent harm to the public' },
    { keywords: ['comply', 'standard'], outcome: 'Meet applicable codes and standards' },
    { keywords: ['complete', 'deliver', 'deadline'], outcome: 'Deliver the project on schedule' },
    { keywords: ['report', 'disclos'], outcome: 'Communicate findings to the appropriate parties' },
];

export const CONSTRAINT_RULES: readonly KeywordRule<string>[] = [
    { keywords: ['financial', 'hardship', 'afford'], outcome: 'Financial pressure or hardship' },
    { keywords: ['resist', 'delay', 'refus', 'postpon'], outcome: 'Resistance or delay from other parties' },
];

/** Arc phrases; matched phrases are chained with ", then " after the participant's name */
export const ARC_RULES: readonly KeywordRule<string>[] = [
    { keywords: ['retain', 'hired', 'engaged'], outcome: 'takes on the engagement' },
    { keywords: ['discover', 'identif'], outcome: 'identifies a problem' },
    { keywords: ['report', 'disclos', 'notif'], outcome: 'reports the concern' },
    { keywords: ['recommend', 'advis'], outcome: 'recommends a course of action' },
    { keywords: ['resist', 'refus', 'insist'], outcome: 'meets resistance' },
];

export const PROFESSIONAL_ROLE_MARKERS: readonly string[] = ['engineer', 'professional'];
export const STAKEHOLDER_ROLE_MARKERS: readonly string[] = ['client', 'stakeholder'];
export const RESISTANCE_MARKERS: readonly string[] = ['resist', 'insist', 'refus', 'objected', 'objection'];
