import type { ApplicationAnswersDto } from '@maestros/contract';
import {
  analyzeApplication,
  fieldLabel,
  validateApplication,
} from './application-scoring';

const validForm = {
  in_game_name: 'NightOwl',
  age: '19',
  country: 'India',
  primary_game: 'Valorant',
  gameplay_hours: 1200,
  rank: 'Diamond',
  experience: 'Three seasons of ranked play in a five stack.',
  reason: 'I want a competitive team where I can improve and learn every week.',
  contribution: 'I can help organize scrims and coach newer players.',
  availability: '25',
};

function answers(overrides: Partial<ApplicationAnswersDto> = {}): ApplicationAnswersDto {
  return {
    in_game_name: 'NightOwl',
    age: 19,
    country: 'India',
    primary_game: 'Valorant',
    gameplay_hours: 50,
    rank: 'Gold',
    experience: 'x'.repeat(20),
    reason: 'x'.repeat(30),
    contribution: 'x'.repeat(20),
    availability: 2,
    ...overrides,
  };
}

describe('fieldLabel', () => {
  it('title-cases snake_case names', () => {
    expect(fieldLabel('in_game_name')).toBe('In Game Name');
  });
});

describe('validateApplication', () => {
  it('normalizes numeric answers on success', () => {
    const result = validateApplication(validForm);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.answers.age).toBe(19);
      expect(result.answers.availability).toBe(25);
    }
  });

  it('reports each missing field as required', () => {
    const result = validateApplication({});

    expect(result.valid).toBe(false);
    expect(result.errors.country).toBe('Country is required');
    expect(result.errors.primary_game).toBe('Primary Game is required');
    expect(Object.keys(result.errors)).toHaveLength(10);
  });

  it('rejects applicants under 13', () => {
    const result = validateApplication({ ...validForm, age: 12 });

    expect(result.errors).toEqual({ age: 'You must be at least 13 years old' });
  });

  it('rejects ages over 100', () => {
    expect(validateApplication({ ...validForm, age: 101 }).errors).toEqual({
      age: 'Please enter a valid age',
    });
  });

  it('rejects non-numeric ages', () => {
    expect(validateApplication({ ...validForm, age: 'twenty' }).errors).toEqual({
      age: 'Age must be a valid number',
    });
  });

  it('caps availability at 168 hours per week', () => {
    expect(validateApplication({ ...validForm, availability: 169 }).errors).toEqual({
      availability: 'Hours per week must be between 0 and 168',
    });
  });

  it('enforces minimum answer lengths', () => {
    const result = validateApplication({ ...validForm, reason: 'Because.' });

    expect(result.errors).toEqual({
      reason: 'Please provide at least 30 characters explaining why you want to join',
    });
  });

  it('bounds the in-game name to 3-20 characters', () => {
    expect(validateApplication({ ...validForm, in_game_name: 'ab' }).errors).toEqual({
      in_game_name: 'In-game name must be between 3 and 20 characters',
    });
  });
});

describe('analyzeApplication', () => {
  it('scores the minimum for thin answers', () => {
    const result = analyzeApplication(answers());

    expect(result.breakdown).toEqual({
      gameplay_hours: 10,
      reason: 5,
      contribution: 5,
      availability: 2,
    });
    expect(result.score).toBe(22);
    expect(result.confidence).toBe(0.5);
    expect(result.recommendation).toBe('Not recommended');
    expect(result.weaknesses).toEqual([
      'Limited gaming hours',
      'Lacks detailed motivation',
      'Unclear contribution plans',
      'Limited time availability',
    ]);
  });

  it('awards full marks for strong answers', () => {
    const reason =
      'I am a dedicated and competitive player who wants to improve alongside a community ' +
      'that values teamwork. I learn quickly, play strategic roles and want to bring that ' +
      'passion to every scrim and tournament we enter together.';
    const contribution =
      'I can coach newer players, help organize weekly scrims and stream our tournament ' +
      'matches to grow the community channel.';

    const result = analyzeApplication(
      answers({
        gameplay_hours: 1500,
        reason,
        contribution,
        experience: 'x'.repeat(200),
        availability: 30,
      }),
    );

    expect(result.score).toBe(100);
    expect(result.confidence).toBe(0.95);
    expect(result.recommendation).toBe('Highly recommended for approval');
  });

  it('uses the middle tiers', () => {
    const result = analyzeApplication(
      answers({
        gameplay_hours: 600,
        reason: 'I want to learn and improve with a team. '.repeat(3),
        contribution: 'I will help with events whenever I can make it online.',
        availability: 12,
      }),
    );

    expect(result.breakdown).toEqual({
      gameplay_hours: 30,
      reason: 20,
      contribution: 15,
      availability: 7,
    });
    expect(result.score).toBe(72);
    expect(result.recommendation).toBe('Recommended for approval');
  });
});
