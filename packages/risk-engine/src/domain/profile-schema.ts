import { InvalidInputError, type ProfileRecord } from "@deepxcheck/core";
import { z } from "zod";
import { parseJoinDate } from "./join-date.js";

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const count = z.number().int().nonnegative();

const profileRecordSchema = z.object({
  username: z.string().trim().min(1, "username must not be blank"),
  displayName: optionalText,
  declaredLocation: optionalText,
  technicalLocation: optionalText,
  device: optionalText,
  bio: z.string().default(""),
  joinDate: optionalText.refine(
    (value) => value === undefined || parseJoinDate(value) !== null,
    "joinDate is not a recognizable date",
  ),
  followers: count,
  following: count,
  nameChanges: count.optional(),
  lastNameChange: optionalText,
  sharedChannels: z.array(z.string()).optional(),
  likeFishing: z.boolean().optional(),
});

export const formatIssues = (error: z.ZodError): readonly string[] =>
  error.issues.map((issue) =>
    issue.path.length === 0 ? issue.message : `${issue.path.join(".")}: ${issue.message}`,
  );

/**
 * Validates an untrusted profile mapping. Unknown keys are dropped and blank
 * optional strings count as absent.
 *
 * @throws InvalidInputError listing every failed field.
 */
export const parseProfileRecord = (raw: unknown): ProfileRecord => {
  const result = profileRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError("invalid profile record", formatIssues(result.error));
  }

  return result.data;
};
