import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { POLICY_TYPES, type PolicyType, type UserPolicies, type UserPolicyDirectory, type UserProfile } from "./types.js";

export class UserDirectoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UserDirectoryError";
  }
}

const documentIdSchema = z.string().trim().min(1);

const userSchema = z.object({
  user_id: z.string().trim().min(1),
  display_name: z.string().trim().min(1).optional(),
  policies: z
    .object({
      auto: documentIdSchema.optional(),
      property: documentIdSchema.optional()
    })
    .strict()
    .default({})
});

export const usersFileSchema = z
  .object({
    users: z.array(userSchema)
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.users.forEach((user, index) => {
      if (seen.has(user.user_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["users", index, "user_id"],
          message: `Duplicate user_id "${user.user_id}"`
        });
      }
      seen.add(user.user_id);
    });
  });

export type UsersFile = z.infer<typeof usersFileSchema>;

/** Policy types the user holds, in canonical order. */
export const listAvailablePolicyTypes = (policies: UserPolicies): PolicyType[] =>
  POLICY_TYPES.filter((type) => typeof policies[type] === "string");

const toProfile = (user: UsersFile["users"][number]): UserProfile =>
  Object.freeze({
    user_id: user.user_id,
    display_name: user.display_name ?? user.user_id,
    policies: Object.freeze({ ...user.policies })
  });

export class StaticUserDirectory implements UserPolicyDirectory {
  private readonly users: Map<string, UserProfile>;

  constructor(users: readonly UserProfile[]) {
    this.users = new Map(users.map((user) => [user.user_id, user]));
  }

  async getUser(userId: string): Promise<UserProfile | null> {
    return this.users.get(userId) ?? null;
  }

  async getUserPolicies(userId: string): Promise<UserPolicies | null> {
    return this.users.get(userId)?.policies ?? null;
  }

  async listUsers(): Promise<UserProfile[]> {
    return Array.from(this.users.values());
  }
}

export const parseUsersFile = (raw: string, sourceLabel = "users file"): UserProfile[] => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new UserDirectoryError(`Invalid JSON in ${sourceLabel}: ${message}`, { cause: error });
  }

  const parsed = usersFileSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("\n");
    throw new UserDirectoryError(`Invalid ${sourceLabel}:\n${details}`);
  }

  return parsed.data.users.map(toProfile);
};

export interface LoadUserDirectoryOptions {
  filePath: string;
  readFile?: (filePath: string, encoding: "utf8") => Promise<string>;
}

export const loadUserDirectory = async (options: LoadUserDirectoryOptions): Promise<StaticUserDirectory> => {
  const resolved = path.resolve(process.cwd(), options.filePath);
  const readFile = options.readFile ?? ((filePath: string, encoding: "utf8") => fs.readFile(filePath, encoding));

  let raw: string;
  try {
    raw = await readFile(resolved, "utf8");
  } catch (error) {
    throw new UserDirectoryError(`Users file "${options.filePath}" could not be read.`, { cause: error });
  }

  return new StaticUserDirectory(parseUsersFile(raw, `users file "${options.filePath}"`));
};
