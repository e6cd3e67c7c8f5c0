import type {
  ApplicationReviewDto,
  ApplicationReviewInputDto,
  ContentAnalysisDto,
  ModerationAction,
  Violation,
} from '@maestros/contract';

export const FLAGGED_KEYWORDS = ['spam', 'scam', 'hack', 'cheat', 'bot', 'sell', 'buy'];

const LINK_PATTERN = /https?:\/\/\S+/i;
const SPAM_UNIQUE_RATIO = 0.3;

function actionFor(confidence: number): ModerationAction {
  if (confidence > 0.8) return 'ban';
  if (confidence > 0.5) return 'warn';
  if (confidence > 0.3) return 'flag';
  return 'none';
}

/**
 * Keyword heuristics. Each check that fires overrides the confidence of
 * the one before it, except links which only raise it to 0.6.
 */
export function analyzeContent(content: string): ContentAnalysisDto {
  const lower = content.toLowerCase();
  const words = lower.split(/\s+/).filter((word) => word.length > 0);
  const violations: Violation[] = [];
  let confidence = 0;

  const isSpam = new Set(words).size < words.length * SPAM_UNIQUE_RATIO;
  if (isSpam) {
    violations.push('spam');
    confidence = 0.7;
  }

  const flaggedWords = FLAGGED_KEYWORDS.filter((keyword) => lower.includes(keyword));
  const isToxic = flaggedWords.length > 0;
  if (isToxic) {
    violations.push('toxicity');
    confidence = Math.min(flaggedWords.length * 0.3, 0.95);
  }

  const isAdvertising = LINK_PATTERN.test(content);
  if (isAdvertising) {
    violations.push('advertising');
    confidence = Math.max(confidence, 0.6);
  }

  return {
    is_spam: isSpam,
    is_toxic: isToxic,
    is_advertising: isAdvertising,
    confidence,
    flagged_words: flaggedWords,
    violations,
    action: actionFor(confidence),
  };
}

const MIN_ANSWER_LENGTH = 20;

/** Quick quality score for free-form application answers, 0 to 100. */
export function reviewApplicationAnswers(
  answers: ApplicationReviewInputDto,
): ApplicationReviewDto {
  let score = 50;
  const factors: string[] = [];

  const reason = answers.reason;
  if (reason !== undefined) {
    const length = String(reason).length;
    if (length > 200) {
      score += 20;
      factors.push('Detailed reason provided');
    } else if (length > 100) {
      score += 10;
      factors.push('Good reason length');
    } else {
      factors.push('Reason could be more detailed');
    }
  }

  const experience = answers.experience;
  if (experience !== undefined && String(experience).length > 100) {
    score += 15;
    factors.push('Good experience description');
  }

  const rawHours = answers.gameplay_hours;
  if (rawHours !== undefined) {
    const hours = Number.parseInt(String(rawHours), 10) || 0;
    if (hours > 500) {
      score += 15;
      factors.push('Extensive gameplay experience');
    } else if (hours > 100) {
      score += 10;
      factors.push('Good gameplay experience');
    }
  }

  const hasShortAnswer = Object.entries(answers).some(
    ([key, value]) => key !== 'gameplay_hours' && String(value).length < MIN_ANSWER_LENGTH,
  );
  if (hasShortAnswer) {
    score -= 20;
    factors.push('Some answers seem too short');
  }

  score = Math.min(Math.max(score, 0), 100);
  return {
    score,
    factors,
    recommendation: score >= 70 ? 'approve' : score >= 50 ? 'review' : 'reject',
  };
}
