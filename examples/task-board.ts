/**
 * Example: tracking bot sessions and the tasks they solve
 *
 * Sessions and tasks are two models joined by a reference. The board shows
 * how to:
 * - register models on a mapper
 * - filter tasks through their session (`session__sessionToken`)
 * - move many tasks to a new status with one update
 * - clear out finished work
 */

import {
  BooleanField,
  createMapper,
  DateTimeField,
  MapperErrorUtils,
  MemoryStore,
  NumberField,
  ReferenceField,
  StringField,
} from "../module.ts";
import type { Mapper, ModelInstance } from "../module.ts";

export const TASK_STATUSES = {
  PENDING: "Pending",
  SUCCESS: "Success",
  FAILURE: "Failure",
  REVOKED: "Revoked",
} as const;

export type TaskStatus = keyof typeof TASK_STATUSES;

const defineModels = (mapper: Mapper) => {
  const Session = mapper.model("Session", {
    token: new StringField({ nullable: false }),
    startedAt: new DateTimeField({ default: () => new Date() }),
  });
  const Task = mapper.model("Task", {
    session: new ReferenceField(Session.schema),
    taskId: new NumberField({ nullable: false }),
    status: new StringField({
      choices: TASK_STATUSES,
      default: "PENDING",
      nullable: false,
    }),
    active: new BooleanField({ default: true }),
  });
  return { Session, Task };
};

export class TaskBoard {
  private constructor(
    private readonly mapper: Mapper,
    private readonly models: ReturnType<typeof defineModels>,
  ) {}

  static async open(mapper?: Mapper): Promise<TaskBoard> {
    const target = mapper ??
      await createMapper({ store: new MemoryStore(), prefix: "board" });
    return new TaskBoard(target, defineModels(target));
  }

  async startSession(token: string) {
    return await this.models.Session.create({ token });
  }

  async addTask(
    session: Awaited<ReturnType<TaskBoard["startSession"]>>,
    taskId: number,
  ) {
    return await this.models.Task.create({ session, taskId });
  }

  /**
   * Tasks of the session with `token` in the given status, by task id
   */
  async tasksFor(token: string, status: TaskStatus = "PENDING") {
    const tasks = await this.models.Task.query({
      session__token: token,
      status,
    });
    return tasks.orderBy("taskId").asList();
  }

  /**
   * Set the status of every pending task of a session; returns how many moved
   */
  async settle(token: string, status: TaskStatus): Promise<number> {
    const updated = await this.models.Task.update(
      { status, active: false },
      { where: { session__token: token, status: "PENDING" } },
    );
    return updated.count();
  }

  /**
   * Remove every task that is no longer active
   */
  async purge(): Promise<number> {
    const finished = await this.models.Task.query({ active: false });
    return await this.models.Task.delete(finished.asList());
  }

  describe(task: ModelInstance): string {
    return `${String(task)} ${String(task.read("status"))}`;
  }

  async close(): Promise<void> {
    await this.mapper.close();
  }
}

export async function runDemo(): Promise<string[]> {
  const board = await TaskBoard.open();
  try {
    const session = await board.startSession("session-a");
    for (const taskId of [3, 1, 2]) {
      await board.addTask(session, taskId);
    }
    const lines = (await board.tasksFor("session-a")).map((task) =>
      board.describe(task)
    );
    lines.push(`settled ${await board.settle("session-a", "SUCCESS")}`);
    lines.push(`purged ${await board.purge()}`);
    return lines;
  } catch (error) {
    return [MapperErrorUtils.getUserMessage(error)];
  } finally {
    await board.close();
  }
}
