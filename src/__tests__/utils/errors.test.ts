import { z } from 'zod';
import { LoadError, PlannerError, SchemaError, ValidationError, errorMessage, formatZodIssues } from '../../utils/errors';

describe('planner errors', () => {
  it('should append issues to the message', () => {
    const error = new SchemaError('Invalid overlay', ['directives.0.action: Invalid input']);
    expect(error.message).toBe('Invalid overlay: directives.0.action: Invalid input');
    expect(error.issues).toEqual(['directives.0.action: Invalid input']);
  });

  it('should name errors after their class', () => {
    expect(new LoadError('Saved plan is not valid JSON').name).toBe('LoadError');
    expect(new ValidationError('bad', 'ss_a').name).toBe('ValidationError');
  });

  it('should keep the offending field', () => {
    const error = new ValidationError('Hours per day must be at most 24', 'hours_per_day_a');
    expect(error.field).toBe('hours_per_day_a');
    expect(error).toBeInstanceOf(PlannerError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('formatZodIssues', () => {
  it('should prefix messages with their path', () => {
    const result = z.object({ port: z.number() }).safeParse({ port: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toEqual(['port: Expected number, received string']);
    }
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
