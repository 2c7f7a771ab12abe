import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ActionablePlan,
  DEFAULT_SCROLL_AMOUNT,
  DeskpilotEnv,
  ExecutionError,
  INPUT_CONTROLLER,
  InputController,
  InteractionResult,
  KeyCombo,
  Point,
  SCREEN_CAPTURE,
  ScreenCaptureProvider,
  ScreenState,
  UIElement,
  delay,
  denormalizePoint,
  describeAction,
  elementTargetPoint,
  errorMessage,
  findElementById,
  isWithinScreen,
  parseKeyDescriptor,
  targetElementId,
  toLogicalPixels,
} from '@deskpilot/shared';
import {
  decodeGreyscale,
  detectGridChanges,
  detectRegionChange,
} from './visual-verification';

const TYPE_AFTER_CLICK_DELAY_MS = 200;

@Injectable()
export class ActionExecutorService {
  private readonly logger = new Logger(ActionExecutorService.name);
  private scalingFactor: number | null = null;

  constructor(
    @Inject(INPUT_CONTROLLER)
    private readonly input: InputController,
    @Inject(SCREEN_CAPTURE)
    private readonly screenCapture: ScreenCaptureProvider,
    private readonly configService: ConfigService<DeskpilotEnv, true>,
  ) {}

  /**
   * Performs the plan's action through the input controller and verifies
   * it against a fresh screenshot. Input faults surface as ExecutionError.
   */
  async execute(
    plan: ActionablePlan,
    currentState: ScreenState,
  ): Promise<InteractionResult> {
    const { action } = plan;
    const target = this.resolveTarget(action, currentState);
    const context: Record<string, unknown> = { action: action.kind };

    this.logger.log(`Executing ${describeAction(action)}`);

    switch (action.kind) {
      case 'click':
        if (!target) {
          throw new ExecutionError(`Click on element ${action.elementId} has no target`);
        }
        context.clickPoint = await this.clickElement(target, currentState);
        break;

      case 'type':
        if (target) {
          context.clickPoint = await this.clickElement(target, currentState);
          await delay(TYPE_AFTER_CLICK_DELAY_MS);
        }
        await this.runInput('type text', () =>
          this.input.typeText(action.text),
        );
        context.characters = action.text.length;
        break;

      case 'scroll': {
        const amount = action.amount > 0 ? action.amount : DEFAULT_SCROLL_AMOUNT;
        await this.runInput(`scroll ${action.direction}`, () =>
          this.input.scroll(action.direction, amount),
        );
        context.amount = amount;
        break;
      }

      case 'press_key': {
        const combo = this.parseCombo(action.keyInfo);
        await this.runInput(`press ${action.keyInfo}`, () =>
          this.input.pressCombo(combo.key, combo.modifiers),
        );
        context.keys = [...combo.modifiers, combo.key];
        break;
      }
    }

    return this.verify(currentState, target, context);
  }

  private resolveTarget(
    action: ActionablePlan['action'],
    currentState: ScreenState,
  ): UIElement | undefined {
    const elementId = targetElementId(action);
    if (elementId === undefined) {
      return undefined;
    }
    const element = findElementById(currentState, elementId);
    if (!element) {
      throw new ExecutionError(
        `Element ${elementId} is not in the current screen state`,
      );
    }
    return element;
  }

  private async clickElement(
    element: UIElement,
    currentState: ScreenState,
  ): Promise<Point> {
    const absolute = denormalizePoint(
      elementTargetPoint(element),
      currentState.dimensions,
    );
    if (!isWithinScreen(absolute, currentState.dimensions)) {
      throw new ExecutionError(
        `Click point (${absolute.x}, ${absolute.y}) for element ${element.id} is outside the ${currentState.dimensions.width}x${currentState.dimensions.height} screen`,
      );
    }

    const logical = toLogicalPixels(absolute, await this.getScalingFactor());
    await this.runInput(`click element ${element.id}`, () =>
      this.input.moveAndClick(logical.x, logical.y, 'left'),
    );
    return logical;
  }

  private parseCombo(keyInfo: string): KeyCombo {
    try {
      return parseKeyDescriptor(keyInfo);
    } catch (error) {
      throw new ExecutionError(errorMessage(error), { cause: error });
    }
  }

  private async runInput(
    description: string,
    operation: () => Promise<void>,
  ): Promise<void> {
    try {
      await operation();
    } catch (error) {
      this.logger.error(
        `Failed to ${description}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new ExecutionError(
        `Failed to ${description}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async getScalingFactor(): Promise<number> {
    if (this.scalingFactor !== null) {
      return this.scalingFactor;
    }

    const configured = this.configService.get('DISPLAY_SCALE_FACTOR', {
      infer: true,
    });
    if (configured !== undefined) {
      this.scalingFactor = configured;
      return configured;
    }

    try {
      this.scalingFactor = await this.input.getScalingFactor();
    } catch (error) {
      this.logger.warn(
        `Could not read display scaling, assuming 1: ${errorMessage(error)}`,
      );
      this.scalingFactor = 1;
    }
    this.logger.log(`Display scaling factor: ${this.scalingFactor}`);
    return this.scalingFactor;
  }

  private async verify(
    before: ScreenState,
    target: UIElement | undefined,
    context: Record<string, unknown>,
  ): Promise<InteractionResult> {
    if (!this.configService.get('VERIFICATION_ENABLED', { infer: true })) {
      return this.inputOnlyResult(context);
    }

    await delay(this.configService.get('VERIFICATION_SETTLE_MS', { infer: true }));
    const threshold = this.configService.get('VERIFICATION_DIFF_THRESHOLD', {
      infer: true,
    });

    try {
      const afterScreenshot = await this.screenCapture.captureScreen();
      const [beforeImage, afterImage] = await Promise.all([
        decodeGreyscale(before.screenshot),
        decodeGreyscale(afterScreenshot),
      ]);

      if (target) {
        const change = detectRegionChange(
          beforeImage,
          afterImage,
          target.bounds,
          threshold,
        );
        return {
          success: true,
          changesDetected: change.changed ? [target.bounds] : [],
          confidence: change.confidence,
          method: 'visual',
          context: { ...context, difference: change.difference },
        };
      }

      const grid = detectGridChanges(beforeImage, afterImage, threshold);
      return {
        success: true,
        changesDetected: grid.changes,
        confidence: grid.confidence,
        method: 'visual',
        context: { ...context, difference: grid.difference },
      };
    } catch (error) {
      this.logger.warn(
        `Visual verification unavailable, reporting input-only result: ${errorMessage(error)}`,
      );
      return this.inputOnlyResult({
        ...context,
        verificationError: errorMessage(error),
      });
    }
  }

  private inputOnlyResult(context: Record<string, unknown>): InteractionResult {
    return {
      success: true,
      changesDetected: [],
      confidence: 0,
      method: 'input',
      context,
    };
  }
}
