import { randomBytes, randomInt, scryptSync } from "node:crypto";
import { err, ok, type Result } from "neverthrow";
import type { Company, WaitlistSubmission } from "../drizzle/schema";
import type { EmissionsStore, WaitlistStore } from "./emissionsStore";

const PASSWORD_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const TEMPORARY_PASSWORD_LENGTH = 12;

export interface SubmissionNotFound {
  type: "SubmissionNotFound";
  message: string;
  submissionId: number;
}

export interface AlreadyPromoted {
  type: "AlreadyPromoted";
  message: string;
  companyId: number;
}

export type PromotionError = SubmissionNotFound | AlreadyPromoted;

export interface Promotion {
  company: Company;
  temporaryPassword: string;
}

export interface WaitlistDetail {
  submission: WaitlistSubmission;
  alreadyPromoted: boolean;
  companyId: number | null;
}

export function generateTemporaryPassword(length = TEMPORARY_PASSWORD_LENGTH): string {
  let password = "";
  for (let i = 0; i < length; i++) {
    password += PASSWORD_ALPHABET[randomInt(PASSWORD_ALPHABET.length)];
  }
  return password;
}

/**
 * scrypt hash stored as `salt:hash`, both hex
 */
export function hashPassword(password: string): string {
  const salt = randomBytes(16).toString("hex");
  const hash = scryptSync(password, salt, 64).toString("hex");
  return `${salt}:${hash}`;
}

export async function getWaitlistDetail(
  store: WaitlistStore,
  submissionId: number
): Promise<WaitlistDetail | undefined> {
  const submission = await store.findSubmission(submissionId);
  if (!submission) return undefined;

  const existing = await store.findCompanyByEmail(submission.email);
  return {
    submission,
    alreadyPromoted: existing !== undefined,
    companyId: existing?.id ?? null,
  };
}

/**
 * Turn a waitlist submission into a company account with a temporary password.
 * Only the hash is stored; the plain password is returned once to the caller.
 */
export async function promoteWaitlistEntry(
  store: WaitlistStore & Pick<EmissionsStore, "logUsageEvent">,
  submissionId: number,
  options: { defaultCountry: string }
): Promise<Result<Promotion, PromotionError>> {
  const submission = await store.findSubmission(submissionId);
  if (!submission) {
    const notFound: SubmissionNotFound = { type: "SubmissionNotFound", message: "Submission not found", submissionId };
    return err(notFound);
  }

  const existing = await store.findCompanyByEmail(submission.email);
  if (existing) {
    const promoted: AlreadyPromoted = {
      type: "AlreadyPromoted",
      message: `User already has a company account (ID: ${existing.id})`,
      companyId: existing.id,
    };
    return err(promoted);
  }

  const temporaryPassword = generateTemporaryPassword();
  const company = await store.promoteSubmission(submission.id, {
    name: submission.company,
    email: submission.email,
    passwordHash: hashPassword(temporaryPassword),
    sector: null,
    country: options.defaultCountry,
    role: "company",
  });

  await store.logUsageEvent({
    companyId: company.id,
    eventType: "waitlist_promoted",
    details: { submissionId: submission.id },
  });
  console.log(`[Waitlist] Promoted submission ${submission.id} to company ${company.id}`);

  return ok({ company, temporaryPassword });
}
