/**
 * Collaborator surface consumed by an API or CLI layer: generation, template
 * rendering and task scheduling behind one object.
 */
import type {
  TemplateInput,
  TemplateOutcome,
  TemplatePatch,
  TemplateStore,
  ListOptions,
} from "./data/template-store.js";
import { PlayforgeError } from "./errors.js";
import type { ScriptGenerator } from "./generation/script-generator.js";
import type {
  RecoveryReport,
  Scheduler,
  SubmitOutcome,
} from "./scheduling/scheduler.js";
import { describePolicy, type LevelPolicy } from "./safety/policy.js";
import { render } from "./templates/renderer.js";
import type {
  GenerationRequest,
  GenerationResult,
  RenderResult,
  SafetyLevel,
  Task,
  TaskDefinition,
  Template,
} from "./types.js";

export interface AutomationServiceDeps {
  /** Absent in processes that only execute tasks, such as the worker. */
  generator?: ScriptGenerator;
  templates: TemplateStore;
  scheduler: Scheduler;
}

export interface AutomationService {
  generate(request: GenerationRequest): Promise<GenerationResult>;
  validate(script: string, level?: SafetyLevel): GenerationResult;
  describeSafetyLevel(level: SafetyLevel): LevelPolicy;
  render(
    templateId: string,
    variables: Record<string, unknown>,
  ): Promise<RenderResult>;
  submitTask(definition: TaskDefinition): Promise<SubmitOutcome>;
  submitGenerated(
    result: GenerationResult,
    definition: Omit<TaskDefinition, "scriptPath" | "scriptContent">,
  ): Promise<SubmitOutcome>;
  cancelTask(jobId: string): Promise<boolean>;
  getTask(taskId: string): Promise<Task | null>;
  listTasks(): Promise<Task[]>;
  removeTask(taskId: string): Promise<boolean>;
  recoverOnRestart(): Promise<RecoveryReport>;
  createTemplate(input: TemplateInput): Promise<TemplateOutcome>;
  getTemplate(id: string): Promise<Template | null>;
  listTemplates(options?: ListOptions): Promise<Template[]>;
  updateTemplate(id: string, patch: TemplatePatch): Promise<TemplateOutcome>;
  deleteTemplate(id: string): Promise<boolean>;
}

export function createAutomationService(
  deps: AutomationServiceDeps,
): AutomationService {
  const { templates, scheduler } = deps;

  const requireGenerator = (): ScriptGenerator => {
    if (!deps.generator) {
      throw new PlayforgeError(
        "Script generation is disabled in this process",
        "GENERATION_DISABLED",
      );
    }
    return deps.generator;
  };

  return {
    generate: async (request) => requireGenerator().generate(request),
    validate: (script, level) => requireGenerator().validate(script, level),
    describeSafetyLevel: (level) => describePolicy(level),

    async render(templateId, variables) {
      const template = await templates.get(templateId);
      if (!template) {
        return { ok: false, errors: [`Template not found: ${templateId}`] };
      }
      return render(template, variables);
    },

    submitTask: (definition) => scheduler.submit(definition),
    submitGenerated: (result, definition) =>
      scheduler.submitGenerated(result, definition),
    cancelTask: (jobId) => scheduler.cancel(jobId),
    getTask: (taskId) => scheduler.get(taskId),
    listTasks: () => scheduler.list(),
    removeTask: (taskId) => scheduler.remove(taskId),
    recoverOnRestart: () => scheduler.recoverOnRestart(),

    createTemplate: (input) => templates.create(input),
    getTemplate: (id) => templates.get(id),
    listTemplates: (options) => templates.list(options),
    updateTemplate: (id, patch) => templates.update(id, patch),
    deleteTemplate: (id) => templates.softDelete(id),
  };
}
