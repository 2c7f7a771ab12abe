import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ActionPlan,
  DeskpilotEnv,
  HistoryEntry,
  PlanTargetMissingError,
  PlannerUnavailableError,
  PlatformHint,
  ScreenState,
  describePlan,
  errorMessage,
  findElementById,
  isDeskpilotError,
  targetElementId,
  windowHistory,
} from '@deskpilot/shared';
import { LANGUAGE_MODEL, LanguageModelService } from '../llm/llm.types';
import { selectPromptElements } from './element-window';
import { PLANNER_SYSTEM_PROMPT, buildPlannerPrompt } from './planner.prompts';
import { parsePlanReply } from './plan.schema';

@Injectable()
export class PlannerService {
  private readonly logger = new Logger(PlannerService.name);

  constructor(
    @Inject(LANGUAGE_MODEL)
    private readonly languageModel: LanguageModelService,
    private readonly configService: ConfigService<DeskpilotEnv, true>,
  ) {}

  /**
   * Asks the language model for the next action. Exactly one model call is
   * made per invocation and `currentState` is only read.
   */
  async plan(
    goal: string,
    history: readonly HistoryEntry[],
    currentState: ScreenState,
    platformHint: PlatformHint,
    signal?: AbortSignal,
  ): Promise<ActionPlan> {
    const previousTarget = history[history.length - 1]?.target;
    const elements = selectPromptElements(
      currentState.elements,
      this.configService.get('PLANNER_MAX_ELEMENTS', { infer: true }),
      previousTarget,
    );
    const prompt = buildPlannerPrompt({
      goal,
      platformHint,
      history: windowHistory(
        history,
        this.configService.get('PLANNER_HISTORY_WINDOW', { infer: true }),
      ),
      elements,
      totalElements: currentState.elements.length,
    });

    const debugPrompts = this.configService.get('DEBUG_FULL_PROMPTS', {
      infer: true,
    });
    if (debugPrompts) {
      this.logger.debug(`Planner prompt:\n${prompt}`);
    }

    let reply: string;
    try {
      reply = await this.languageModel.complete(prompt, {
        systemPrompt: PLANNER_SYSTEM_PROMPT,
        signal,
      });
    } catch (error) {
      if (isDeskpilotError(error)) {
        throw error;
      }
      throw new PlannerUnavailableError(
        `Language model call failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (debugPrompts) {
      this.logger.debug(`Planner reply:\n${reply}`);
    }

    const plan = parsePlanReply(reply);
    this.logger.log(`Planned ${describePlan(plan)}: ${plan.reasoning}`);

    if (!plan.isGoalComplete) {
      const elementId = targetElementId(plan.action);
      if (
        elementId !== undefined &&
        !findElementById(currentState, elementId)
      ) {
        throw new PlanTargetMissingError(elementId);
      }
    }
    return plan;
  }
}
