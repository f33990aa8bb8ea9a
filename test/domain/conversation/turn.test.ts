import { StepStatus, canTransitionStep } from '../../../src/domain/conversation/turn.js';
import { InvalidStateTransitionError } from '../../../src/domain/errors.js';

describe('StepStatus', () => {
  it('starts in processing', () => {
    const status = StepStatus.start('judgment', 'Profile');

    expect(status.kind).toBe('judgment');
    expect(status.attributeName).toBe('Profile');
    expect(status.state).toBe('processing');
    expect(status.isTerminal).toBe(false);
  });

  it('completes once', () => {
    const status = StepStatus.start('response');
    status.complete();

    expect(status.state).toBe('completed');
    expect(status.isTerminal).toBe(true);
    expect(() => status.complete()).toThrow(InvalidStateTransitionError);
    expect(() => status.fail()).toThrow(InvalidStateTransitionError);
  });

  it('cannot be resurrected after failing', () => {
    const status = StepStatus.start('attribute_extraction', 'Profile');
    status.fail();

    expect(status.state).toBe('failed');
    expect(() => status.complete()).toThrow('Invalid state transition: failed -> completed');
  });

  it('creates the reply-ready notice already completed, with a copy of the attributes', () => {
    const used = { Profile: 'engineer' };
    const status = StepStatus.responseReady('Hi there!', used);
    used.Profile = 'changed';

    expect(status.kind).toBe('response_ready');
    expect(status.state).toBe('completed');
    expect(status.responseText).toBe('Hi there!');
    expect(status.usedAttributes).toEqual({ Profile: 'engineer' });
  });

  it('describes each step', () => {
    expect(StepStatus.start('input_translation').displayText).toBe('Translating your message');
    expect(StepStatus.start('judgment', 'Profile').displayText).toBe(
      'Checking whether "Profile" is needed for the reply'
    );
    expect(StepStatus.start('response').displayText).toBe('Generating the reply');
    expect(StepStatus.start('output_translation').displayText).toBe('Translating the reply');
    expect(StepStatus.responseReady('ok', {}).displayText).toBe('Reply ready');
    expect(StepStatus.start('attribute_extraction', 'Profile').displayText).toBe(
      'Extracting "Profile" from your message'
    );
  });
});

describe('canTransitionStep', () => {
  it('only allows leaving processing', () => {
    expect(canTransitionStep('processing', 'completed')).toBe(true);
    expect(canTransitionStep('processing', 'failed')).toBe(true);
    expect(canTransitionStep('completed', 'failed')).toBe(false);
    expect(canTransitionStep('failed', 'processing')).toBe(false);
  });
});
