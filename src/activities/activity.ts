import { randomUUID } from 'crypto';

/** Узел, его родитель и дед: глубже трех уровней дерево не растет */
export const MAX_NESTING_LEVEL = 3;

export interface Activity {
  activityId: string;
  parentId: string | null;
  name: string;
}

export const createActivity = (
  fields: Pick<Activity, 'name'> & Partial<Pick<Activity, 'parentId'>>,
): Activity => ({
  activityId: randomUUID(),
  parentId: fields.parentId ?? null,
  name: fields.name,
});
