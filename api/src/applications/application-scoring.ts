import type {
  ApplicationAnalysisDto,
  ApplicationAnswersDto,
  ApplicationFormDto,
} from '@maestros/contract';

export const REQUIRED_FIELDS = {
  personal: ['in_game_name', 'age', 'country'],
  gaming: ['primary_game', 'gameplay_hours', 'rank', 'experience'],
  motivation: ['reason', 'contribution', 'availability'],
} as const;

const ALL_REQUIRED: readonly string[] = [
  ...REQUIRED_FIELDS.personal,
  ...REQUIRED_FIELDS.gaming,
  ...REQUIRED_FIELDS.motivation,
];

const MOTIVATION_KEYWORDS = [
  'competitive',
  'teamwork',
  'improve',
  'learn',
  'community',
  'passion',
  'dedicated',
  'skilled',
  'strategic',
  'professional',
];

const CONTRIBUTION_KEYWORDS = [
  'help',
  'teach',
  'mentor',
  'organize',
  'lead',
  'content',
  'stream',
  'coach',
  'guide',
  'support',
];

export type ApplicationValidation =
  | { valid: true; errors: Record<string, string>; answers: ApplicationAnswersDto }
  | { valid: false; errors: Record<string, string> };

/** `in_game_name` → `In Game Name` */
export function fieldLabel(field: string): string {
  return field
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === '' ||
    value === 0 ||
    value === false
  );
}

/** Whole-number parse: numbers truncate, strings must be integer literals. */
function toInteger(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

function text(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  return String(value);
}

/**
 * Field-level checks for a membership form. Errors are keyed by field; a
 * later rule for the same field replaces the "is required" message.
 */
export function validateApplication(form: ApplicationFormDto): ApplicationValidation {
  const errors: Record<string, string> = {};

  for (const field of ALL_REQUIRED) {
    if (isBlank(form[field])) {
      errors[field] = `${fieldLabel(field)} is required`;
    }
  }

  const age = toInteger(form.age);
  if ('age' in form) {
    if (age === null) {
      errors.age = 'Age must be a valid number';
    } else if (age < 13) {
      errors.age = 'You must be at least 13 years old';
    } else if (age > 100) {
      errors.age = 'Please enter a valid age';
    }
  }

  const hours = toInteger(form.gameplay_hours);
  if ('gameplay_hours' in form) {
    if (hours === null) {
      errors.gameplay_hours = 'Hours must be a valid number';
    } else if (hours < 0) {
      errors.gameplay_hours = 'Hours must be a positive number';
    }
  }

  const availability = toInteger(form.availability);
  if ('availability' in form) {
    if (availability === null) {
      errors.availability = 'Availability must be a valid number';
    } else if (availability < 0 || availability > 168) {
      errors.availability = 'Hours per week must be between 0 and 168';
    }
  }

  if ('experience' in form && text(form.experience).length < 20) {
    errors.experience =
      'Please provide at least 20 characters describing your experience';
  }
  if ('reason' in form && text(form.reason).length < 30) {
    errors.reason =
      'Please provide at least 30 characters explaining why you want to join';
  }
  if ('contribution' in form && text(form.contribution).length < 20) {
    errors.contribution =
      'Please provide at least 20 characters about your contribution';
  }
  if ('in_game_name' in form) {
    const length = text(form.in_game_name).length;
    if (length < 3 || length > 20) {
      errors.in_game_name = 'In-game name must be between 3 and 20 characters';
    }
  }

  if (Object.keys(errors).length > 0 || age === null || hours === null || availability === null) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    errors,
    answers: {
      in_game_name: text(form.in_game_name),
      age,
      country: text(form.country),
      primary_game: text(form.primary_game),
      gameplay_hours: hours,
      rank: text(form.rank),
      experience: text(form.experience),
      reason: text(form.reason),
      contribution: text(form.contribution),
      availability,
    },
  };
}

function countKeywords(value: string, keywords: readonly string[]): number {
  const lower = value.toLowerCase();
  return keywords.filter((keyword) => lower.includes(keyword)).length;
}

/** Heuristic 0–100 score with the reasons behind it. */
export function analyzeApplication(answers: ApplicationAnswersDto): ApplicationAnalysisDto {
  const strengths: string[] = [];
  const weaknesses: string[] = [];

  let hoursScore: number;
  if (answers.gameplay_hours > 1000) {
    hoursScore = 40;
    strengths.push('Very experienced gamer');
  } else if (answers.gameplay_hours > 500) {
    hoursScore = 30;
    strengths.push('Experienced gamer');
  } else if (answers.gameplay_hours > 100) {
    hoursScore = 20;
  } else {
    hoursScore = 10;
    weaknesses.push('Limited gaming hours');
  }

  const reasonMatches = countKeywords(answers.reason, MOTIVATION_KEYWORDS);
  let reasonScore: number;
  if (answers.reason.length > 200 && reasonMatches >= 3) {
    reasonScore = 30;
    strengths.push('Strong motivation and clear goals');
  } else if (answers.reason.length > 100 && reasonMatches >= 2) {
    reasonScore = 20;
    strengths.push('Good understanding of community');
  } else if (answers.reason.length > 50) {
    reasonScore = 10;
  } else {
    reasonScore = 5;
    weaknesses.push('Lacks detailed motivation');
  }

  const contributionMatches = countKeywords(answers.contribution, CONTRIBUTION_KEYWORDS);
  let contributionScore: number;
  if (answers.contribution.length > 100 && contributionMatches >= 2) {
    contributionScore = 20;
    strengths.push('Ready to contribute actively');
  } else if (answers.contribution.length > 50 && contributionMatches >= 1) {
    contributionScore = 15;
  } else {
    contributionScore = 5;
    weaknesses.push('Unclear contribution plans');
  }

  let availabilityScore: number;
  if (answers.availability >= 20) {
    availabilityScore = 10;
    strengths.push('Highly available for events');
  } else if (answers.availability >= 10) {
    availabilityScore = 7;
  } else if (answers.availability >= 5) {
    availabilityScore = 4;
  } else {
    availabilityScore = 2;
    weaknesses.push('Limited time availability');
  }

  const totalLength =
    answers.reason.length + answers.contribution.length + answers.experience.length;
  let confidence: number;
  if (totalLength > 500) confidence = 0.95;
  else if (totalLength > 300) confidence = 0.85;
  else if (totalLength > 150) confidence = 0.7;
  else confidence = 0.5;

  const score = Math.min(
    hoursScore + reasonScore + contributionScore + availabilityScore,
    100,
  );

  let recommendation: string;
  if (score >= 80) recommendation = 'Highly recommended for approval';
  else if (score >= 60) recommendation = 'Recommended for approval';
  else if (score >= 40) recommendation = 'Consider for approval with interview';
  else recommendation = 'Not recommended';

  return {
    score,
    confidence,
    recommendation,
    strengths,
    weaknesses,
    breakdown: {
      gameplay_hours: hoursScore,
      reason: reasonScore,
      contribution: contributionScore,
      availability: availabilityScore,
    },
  };
}
