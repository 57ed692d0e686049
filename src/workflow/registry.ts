/**
 * Step registry.
 *
 * Every check that depends only on a step's declared shape happens here, at
 * registration, so a bad declaration fails before any run starts:
 *   - the declaration parses
 *   - the id is unique
 *   - the logic plugin exists (when a logic catalog is attached)
 *   - every bound hub hosts the bound data type
 *   - relative bindings respect causality
 */

import { EngineError } from "../errors.js";
import { StepSchema, type StepInput } from "../config/engine/schema.js";
import { EngineConfigError, deepFreeze, formatZodIssues } from "../config/engine/loader.js";
import type { HubPathResolver } from "../hubs/index.js";
import { CausalityValidator } from "../causality/index.js";
import type { BusinessLogic, WorkflowStep } from "./step.js";

export class DuplicateStepError extends EngineError {
  constructor(readonly stepId: string) {
    super("DUPLICATE_STEP", `Step "${stepId}" is already registered`);
  }
}

export class UnknownLogicError extends EngineError {
  constructor(readonly logic: string, readonly stepId: string) {
    super("UNKNOWN_LOGIC", `Step "${stepId}" uses unknown business logic "${logic}"`);
  }
}

export interface StepRegistryOptions {
  resolver: HubPathResolver;
  validator?: CausalityValidator;
  /**
   * Business-logic plugins by name. Without a catalog, logic names are not
   * checked at registration and no step can be executed.
   */
  logic?: ReadonlyMap<string, BusinessLogic>;
}

export class StepRegistry {
  private readonly steps = new Map<string, WorkflowStep>();
  private readonly resolver: HubPathResolver;
  private readonly validator: CausalityValidator;
  private readonly logic: ReadonlyMap<string, BusinessLogic> | undefined;

  constructor(options: StepRegistryOptions) {
    this.resolver = options.resolver;
    this.validator = options.validator ?? new CausalityValidator();
    this.logic = options.logic;
  }

  /**
   * @throws EngineConfigError, DuplicateStepError, UnknownLogicError,
   *   UnknownHubError, UnknownTypeError, UnhostedTypeError,
   *   FutureReferenceError, SelfReferenceAtSameTimestampError
   */
  register(declaration: StepInput): WorkflowStep {
    const parsed = StepSchema.safeParse(declaration);
    if (!parsed.success) {
      throw new EngineConfigError(
        `Invalid declaration for step "${declaration.id}"`,
        formatZodIssues(parsed.error.issues)
      );
    }
    const step: WorkflowStep = parsed.data;

    if (this.steps.has(step.id)) {
      throw new DuplicateStepError(step.id);
    }
    if (this.logic && !this.logic.has(step.logic)) {
      throw new UnknownLogicError(step.logic, step.id);
    }
    this.resolver.assertHosted(step.output.hub, step.output.object.dataType);
    for (const binding of Object.values(step.inputs)) {
      this.resolver.assertHosted(binding.hub, binding.object.dataType);
    }
    this.validator.validate(step);

    const frozen = deepFreeze(step);
    this.steps.set(step.id, frozen);
    return frozen;
  }

  has(id: string): boolean {
    return this.steps.has(id);
  }

  get(id: string): WorkflowStep | undefined {
    return this.steps.get(id);
  }

  /**
   * Registered steps in declaration order.
   */
  list(): WorkflowStep[] {
    return [...this.steps.values()];
  }

  /**
   * @throws UnknownLogicError
   */
  logicFor(step: WorkflowStep): BusinessLogic {
    const logic = this.logic?.get(step.logic);
    if (!logic) {
      throw new UnknownLogicError(step.logic, step.id);
    }
    return logic;
  }
}
