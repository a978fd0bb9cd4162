import { loadDocument, type DeploymentDocument } from "../lib/document";
import { CliError } from "../lib/errors";
import { resolveDocuments, type ResolutionResult, type ResolveOptions } from "../lib/resolver";
import type { HostRuntime } from "../lib/runtime";
import type { InstanceHandle, InstantiationPlan } from "../lib/types";

export interface ResolveFilesOptions extends ResolveOptions {
  project?: string;
}

export interface ResolvedFiles extends ResolutionResult {
  documents: DeploymentDocument[];
}

/**
 * Loads every document and resolves them together, since documents passed in
 * one invocation share a host. A project override only makes sense for a
 * single document; with several, each keeps its directory-derived name.
 */
export function resolveFiles(files: string[], options: ResolveFilesOptions = {}): ResolvedFiles {
  const project = files.length === 1 ? options.project : undefined;
  const documents = files.map((file) => loadDocument(file, { project }));
  return { documents, ...resolveDocuments(documents, options) };
}

export function selectPlans(plans: InstantiationPlan[], services: string[]): InstantiationPlan[] {
  if (services.length === 0) {
    return plans;
  }

  const available = new Set(plans.flatMap((plan) => [plan.name, plan.containerName]));
  const unknown = services.filter((service) => !available.has(service));
  if (unknown.length > 0) {
    throw new CliError({
      kind: "not_found",
      message: `No valid plan for: ${unknown.join(", ")}`,
      hint: "Run `deckhand validate` to see which services failed to resolve."
    });
  }
  return plans.filter((plan) => services.includes(plan.name) || services.includes(plan.containerName));
}

export type ApplyOutcome =
  | { plan: InstantiationPlan; ok: true; handle: InstanceHandle }
  | { plan: InstantiationPlan; ok: false; error: unknown };

export interface ApplyHooks {
  onStart?: (plan: InstantiationPlan) => void;
  onSettled?: (outcome: ApplyOutcome) => void;
}

/**
 * Applies plans concurrently. Sibling order is not guaranteed; one failure
 * never stops the others. Outcomes come back in plan order.
 */
export async function applyPlans(
  runtime: HostRuntime,
  plans: InstantiationPlan[],
  hooks: ApplyHooks = {}
): Promise<ApplyOutcome[]> {
  return await Promise.all(
    plans.map(async (plan): Promise<ApplyOutcome> => {
      hooks.onStart?.(plan);
      let outcome: ApplyOutcome;
      try {
        outcome = { plan, ok: true, handle: await runtime.applyPlan(plan) };
      } catch (error) {
        outcome = { plan, ok: false, error };
      }
      hooks.onSettled?.(outcome);
      return outcome;
    })
  );
}
