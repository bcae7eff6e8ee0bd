import { Milestone, MilestoneTemplate } from '../types/workspace';
import { WorkspaceValidationError } from './workspace.errors';

export const DEFAULT_MILESTONES: readonly MilestoneTemplate[] = [
  { name: 'Initial Design', description: 'Design phase and planning' },
  { name: 'Development', description: 'Core development work' },
  { name: 'Testing', description: 'Testing and quality assurance' },
  { name: 'Final Delivery', description: 'Final deliverable submission' },
];

/** Percentage of approved milestones, rounded down. A project without milestones is at 0. */
export function computeProgress(milestones: Pick<Milestone, 'status'>[]): number {
  if (milestones.length === 0) return 0;
  const approved = milestones.filter(m => m.status === 'approved').length;
  return Math.floor((approved * 100) / milestones.length);
}

/** Validates a caller-supplied milestone list entry by entry; `undefined` selects the default template. */
export function resolveMilestoneTemplates(templates?: unknown): readonly MilestoneTemplate[] {
  if (templates === undefined) return DEFAULT_MILESTONES;
  if (!Array.isArray(templates)) {
    throw new WorkspaceValidationError('Milestones must be a list');
  }
  if (templates.length === 0) {
    throw new WorkspaceValidationError('A workspace needs at least one milestone');
  }
  return templates.map((template: unknown, index) => toTemplate(template, index + 1));
}

function toTemplate(template: unknown, position: number): MilestoneTemplate {
  if (typeof template !== 'object' || template === null) {
    throw new WorkspaceValidationError(`Milestone ${position} must be an object`);
  }
  const name = 'name' in template ? template.name : undefined;
  const description = 'description' in template ? template.description : undefined;
  const dueDate = 'dueDate' in template ? template.dueDate : undefined;
  if (typeof name !== 'string' || !name.trim()) {
    throw new WorkspaceValidationError(`Milestone ${position} has no name`);
  }
  if (description !== undefined && typeof description !== 'string') {
    throw new WorkspaceValidationError(`Milestone ${position} description must be text`);
  }
  if (dueDate !== undefined && dueDate !== null && typeof dueDate !== 'string') {
    throw new WorkspaceValidationError(`Milestone ${position} due date must be text`);
  }
  return { name, description, dueDate };
}
