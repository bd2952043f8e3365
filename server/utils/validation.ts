import { z } from "zod";
import { insertTaskSchema, insertUserSchema } from "@db/schema";

// Constants for validation
export const ACCOUNT_CONSTRAINTS = {
  MIN_PASSWORD_LENGTH: 8,
  MAX_PASSWORD_LENGTH: 128,
  MIN_MANAGER_CODE_LENGTH: 4,
  MAX_MANAGER_CODE_LENGTH: 50,
};

const passwordSchema = z
  .string()
  .min(ACCOUNT_CONSTRAINTS.MIN_PASSWORD_LENGTH, `Password must be at least ${ACCOUNT_CONSTRAINTS.MIN_PASSWORD_LENGTH} characters`)
  .max(ACCOUNT_CONSTRAINTS.MAX_PASSWORD_LENGTH, `Password cannot exceed ${ACCOUNT_CONSTRAINTS.MAX_PASSWORD_LENGTH} characters`)
  .refine((value) => !/^\d+$/.test(value), "Password cannot be entirely numeric");

const idSchema = z.number().int().positive();

export const registerSchema = insertUserSchema
  .pick({ username: true, email: true, firstName: true, lastName: true, patronymic: true })
  .extend({
    password: passwordSchema,
    password2: z.string(),
    managerCode: z.string().trim().min(1).max(ACCOUNT_CONSTRAINTS.MAX_MANAGER_CODE_LENGTH).optional(),
  })
  .refine((data) => data.password === data.password2, {
    message: "Passwords do not match",
    path: ["password2"],
  });

export const loginSchema = z.object({
  username: z.string().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
});

export const profileSchema = insertUserSchema.pick({ firstName: true, lastName: true, patronymic: true });

export const changePasswordSchema = z
  .object({
    oldPassword: z.string().min(1, "Current password is required"),
    newPassword1: passwordSchema,
    newPassword2: z.string(),
  })
  .refine((data) => data.newPassword1 === data.newPassword2, {
    message: "Passwords do not match",
    path: ["newPassword2"],
  });

export const createTaskSchema = insertTaskSchema
  .pick({ title: true, description: true, difficulty: true, expectedDurationSeconds: true })
  .extend({ performerId: idSchema.optional() });

export const assignTaskSchema = z.object({
  performerId: idSchema,
});

export const createReportSchema = z.object({
  text: z.string().trim().min(1, "Report text is required"),
});

export const createRewardSchema = z.object({
  comment: z.string().trim().min(1, "Comment is required"),
});

export const generateCodesSchema = z.object({
  count: z.number().int().min(1, "Count must be at least 1").max(1000, "Cannot generate more than 1000 codes at once"),
  length: z
    .number()
    .int()
    .min(ACCOUNT_CONSTRAINTS.MIN_MANAGER_CODE_LENGTH)
    .max(ACCOUNT_CONSTRAINTS.MAX_MANAGER_CODE_LENGTH)
    .default(8),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type ProfileInput = z.infer<typeof profileSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;

/** Parses a route parameter as a positive integer id, or null. */
export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = parseInt(raw, 10);
  return id > 0 && Number.isSafeInteger(id) ? id : null;
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message));
}
