import { randomUUID } from "node:crypto";
import {
  BooleanField,
  DateTimeField,
  DecimalField,
  DictField,
  ListField,
  NumberField,
  StringField,
} from "./fields.ts";
import type { Logger } from "./logger.ts";
import { ManyToManyField, ReferenceField } from "./relations.ts";
import { defineModel } from "./schema.ts";

export const sessionSchema = defineModel("BotSession", {
  sessionToken: new StringField({ default: () => randomUUID() }),
  createdAt: new DateTimeField({ default: () => new Date() }),
});

export const taskSchema = defineModel("TaskToSolve", {
  session: new ReferenceField(sessionSchema),
  taskId: new NumberField(),
  status: new StringField({
    choices: {
      REVOKED: "Revoked",
      SUCCESS: "Success",
      FAILURE: "Failure",
      PENDING: "Pending",
    },
    default: "PENDING",
    nullable: false,
  }),
  createdAt: new DateTimeField({ default: () => new Date() }),
  active: new BooleanField({ default: true }),
});

export const tagSchema = defineModel("Tag", {
  label: new StringField({ nullable: false }),
});

export const productSchema = defineModel("Product", {
  name: new StringField({ nullable: false }),
  price: new DecimalField(),
  stock: new NumberField({ default: 0 }),
  attributes: new DictField(),
  sizes: new ListField(),
  tags: new ManyToManyField(tagSchema),
});

/**
 * A logger that keeps every message, by level
 */
export const createRecordingLogger = (): Logger & {
  messages: { level: string; message: string }[];
} => {
  const messages: { level: string; message: string }[] = [];
  const record = (level: string) => (message: string): void => {
    messages.push({ level, message });
  };
  return {
    messages,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
};
