import { ConfigService } from '@nestjs/config';
import {
  DeskpilotEnv,
  HistoryEntry,
  PlanTargetMissingError,
  PlannerUnavailableError,
  ScreenState,
  UIElement,
  createUIElement,
  validateEnv,
} from '@deskpilot/shared';
import { CompletionOptions, LanguageModelService } from '../llm/llm.types';
import { PLANNER_SYSTEM_PROMPT } from './planner.prompts';
import { PlannerService } from './planner.service';

function configFor(
  overrides: Record<string, string> = {},
): ConfigService<DeskpilotEnv, true> {
  const env = validateEnv(overrides);
  return {
    get: (key: keyof DeskpilotEnv) => env[key],
  } as unknown as ConfigService<DeskpilotEnv, true>;
}

function element(id: number, type: string, content: string, x = 0.1): UIElement {
  return createUIElement({
    id,
    type,
    content,
    bounds: { x, y: 0.5, width: 0.2, height: 0.1 },
    confidence: 0.9,
  });
}

function stateWith(elements: UIElement[]): ScreenState {
  return {
    elements,
    dimensions: { width: 1000, height: 800 },
    timestamp: 0,
    screenshot: Buffer.alloc(0),
  };
}

function historyEntry(step: number, target?: UIElement): HistoryEntry {
  return {
    step,
    plan: {
      reasoning: '',
      isGoalComplete: false,
      action: { kind: 'click', elementId: target?.id ?? 0 },
    },
    target,
    summary: 'clicked',
    success: true,
    timestamp: step,
  };
}

describe('PlannerService', () => {
  const submit = createUIElement({
    id: 0,
    type: 'button',
    content: 'Submit',
    bounds: { x: 0.4, y: 0.5, width: 0.2, height: 0.1 },
    confidence: 0.9,
  });

  let complete: jest.Mock<Promise<string>, [string, CompletionOptions?]>;
  let languageModel: LanguageModelService;

  beforeEach(() => {
    complete = jest.fn<Promise<string>, [string, CompletionOptions?]>();
    languageModel = { provider: 'anthropic', complete };
  });

  function lastPrompt(): string {
    return complete.mock.calls[0][0];
  }

  it('asks the model once and returns the parsed plan', async () => {
    complete.mockResolvedValue(
      '{"reasoning":"submit it","action":"click","element_id":0,"is_goal_complete":false}',
    );
    const planner = new PlannerService(languageModel, configFor());

    const plan = await planner.plan(
      'Submit the form',
      [],
      stateWith([submit]),
      'macOS',
    );

    expect(plan).toEqual({
      reasoning: 'submit it',
      isGoalComplete: false,
      action: { kind: 'click', elementId: 0 },
    });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][1]).toEqual({
      systemPrompt: PLANNER_SYSTEM_PROMPT,
      signal: undefined,
    });

    const lines = lastPrompt().split('\n');
    expect(lines).toContain('Submit the form');
    expect(lines).toContain(
      "ID: 0, Type: button, Content: 'Submit', Bounds: (0.40, 0.50, 0.20, 0.10)",
    );
    expect(lines).toContain(
      'Operating system: macOS. Use Cmd as the primary modifier for shortcuts (e.g. Cmd+T for a new tab).',
    );
    expect(lines[lines.indexOf('PREVIOUS STEPS') + 1]).toBe('(none)');
  });

  it('forwards the abort signal to the model', async () => {
    complete.mockResolvedValue(
      '{"reasoning":"","action":"press_key","key_info":"Enter","is_goal_complete":false}',
    );
    const controller = new AbortController();
    const planner = new PlannerService(languageModel, configFor());

    await planner.plan('g', [], stateWith([]), 'Linux', controller.signal);

    expect(complete.mock.calls[0][1]?.signal).toBe(controller.signal);
  });

  it('rejects a plan whose target is not on screen', async () => {
    complete.mockResolvedValue(
      '{"reasoning":"","action":"click","element_id":7,"is_goal_complete":false}',
    );
    const planner = new PlannerService(languageModel, configFor());

    await expect(
      planner.plan('g', [], stateWith([submit]), 'Linux'),
    ).rejects.toThrow(PlanTargetMissingError);
  });

  it('does not check targets of a goal-complete plan', async () => {
    complete.mockResolvedValue(
      '{"reasoning":"done","action":"click","element_id":7,"is_goal_complete":true}',
    );
    const planner = new PlannerService(languageModel, configFor());

    await expect(
      planner.plan('g', [], stateWith([submit]), 'Linux'),
    ).resolves.toEqual({
      reasoning: 'done',
      isGoalComplete: true,
      action: { kind: 'click', elementId: 7 },
    });
  });

  it('classifies unexpected model failures as planner unavailable', async () => {
    complete.mockRejectedValue(new Error('socket hang up'));
    const planner = new PlannerService(languageModel, configFor());

    await expect(
      planner.plan('g', [], stateWith([submit]), 'Linux'),
    ).rejects.toThrow('Language model call failed: socket hang up');
  });

  it('passes through errors the model already classified', async () => {
    const aborted = new PlannerUnavailableError('aborted');
    complete.mockRejectedValue(aborted);
    const planner = new PlannerService(languageModel, configFor());

    await expect(
      planner.plan('g', [], stateWith([submit]), 'Linux'),
    ).rejects.toBe(aborted);
  });

  it('shows only the most recent history entries', async () => {
    complete.mockResolvedValue(
      '{"reasoning":"","action":"click","element_id":0,"is_goal_complete":false}',
    );
    const planner = new PlannerService(
      languageModel,
      configFor({ PLANNER_HISTORY_WINDOW: '1' }),
    );

    await planner.plan(
      'g',
      [historyEntry(1, submit), historyEntry(2, submit)],
      stateWith([submit]),
      'Linux',
    );

    const lines = lastPrompt().split('\n');
    expect(lines).toContain('Step 2: click element 0 -> succeeded: clicked');
    expect(lines).not.toContain('Step 1: click element 0 -> succeeded: clicked');
  });

  it('keeps the previous target when truncating the element list', async () => {
    complete.mockResolvedValue(
      '{"reasoning":"","action":"click","element_id":2,"is_goal_complete":false}',
    );
    const planner = new PlannerService(
      languageModel,
      configFor({ PLANNER_MAX_ELEMENTS: '2' }),
    );
    const previous = element(5, 'link', 'Next', 0.7);
    const elements = [
      element(0, 'text', 'Title'),
      element(1, 'text', 'Body'),
      element(2, 'link', 'Next', 0.6),
    ];

    await planner.plan(
      'g',
      [historyEntry(1, previous)],
      stateWith(elements),
      'Linux',
    );

    const prompt = lastPrompt();
    expect(prompt).toContain('CURRENT UI ELEMENTS (2 of 3)');
    expect(prompt).toContain("ID: 0, Type: text, Content: 'Title'");
    expect(prompt).toContain("ID: 2, Type: link, Content: 'Next'");
    expect(prompt).not.toContain("ID: 1, Type: text, Content: 'Body'");
  });
});
