import { pgTable, text, bigint, boolean, integer, primaryKey } from 'drizzle-orm/pg-core';

export const projects = pgTable('projects', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  firstTask: integer('first_task'),
  isPublic: boolean('is_public').notNull().default(false),
  createdBy: text('created_by').notNull(),
  createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
});

// Task ids are only unique inside their project; `next` points at a task of the same project.
export const tasks = pgTable(
  'tasks',
  {
    id: integer('task_id').notNull(),
    projectId: text('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    level: integer('level').notNull().default(0),
    value: text('value').notNull().default(''),
    next: integer('next'),
    completed: boolean('completed').notNull().default(false),
    completedBy: text('completed_by'),
    createdBy: text('created_by').notNull(),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    updatedAt: bigint('updated_at', { mode: 'number' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.projectId, table.id] }),
  })
);
