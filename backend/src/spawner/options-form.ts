// src/spawner/options-form.ts
import { z, ZodIssueCode } from "zod";
import { ValidationError } from "../errors";
import type { AuthorizationState } from "../types/claims";

/** Validated spawn options, every non-null value shell-quoted. */
export interface FormOptions {
  brics_project: string;
  runtime: string;
  ngpus: string;
  partition: string | null;
  reservation: string | null;
}

export type FormFields = Record<string, string[]>;

// project ids are "<name>" or "<name>.<portal>", two characters at least
const PROJECT_RE = /^[a-z](?:[a-z0-9\-_]+|[a-z0-9\-_]*\.[a-z0-9\-_]+)$/;
// H:M:S time of day, one or two digits per component
const RUNTIME_RE = /^([01]?\d|2[0-3]):[0-5]?\d:[0-5]?\d$/;
const NGPUS_RE = /^\d$/;
const SLURM_NAME_RE = /^[a-zA-Z0-9\-_]*$/;

const SHELL_UNSAFE_RE = /[^\w@%+=:,./-]/;

/**
 * POSIX-shell quoting so a value can sit literally in a command line.
 * Safe strings pass through; anything else is single-quoted with each
 * embedded ' written as '"'"'.
 */
export function defuse(input: string): string {
  if (input === "") return "''";
  if (!SHELL_UNSAFE_RE.test(input)) return input;
  return `'${input.replace(/'/g, `'"'"'`)}'`;
}

function required(field: string) {
  return z
    .array(z.string(), { required_error: `${field} is required` })
    .min(1, `${field} is required`)
    .transform((v) => v[0]);
}

function optional(field: string) {
  return z
    .array(z.string())
    .default([""])
    .transform((v) => v[0] ?? "")
    .pipe(z.string().regex(SLURM_NAME_RE, `${field} not valid`))
    .transform((v) => (v === "" ? null : v));
}

function formSchema(validProjects: ReadonlySet<string>) {
  return z
    .object({
      brics_project: required("brics_project").pipe(
        z
          .string()
          .regex(PROJECT_RE, "brics_project not valid")
          .refine((p) => validProjects.has(p), "unknown brics_project")
      ),
      runtime: required("runtime").pipe(z.string().regex(RUNTIME_RE, "runtime not valid")),
      ngpus: required("ngpus").pipe(z.string().regex(NGPUS_RE, "ngpus not valid")),
      partition: optional("partition"),
      reservation: optional("reservation")
    })
    .strict("unknown form data keys");
}

/**
 * Validates a spawn-options submission against the user's projects and
 * defuses every value. Only the first value of each field is consulted.
 */
export function validateAndSanitize(fields: FormFields, validProjects: ReadonlySet<string>): FormOptions {
  const parsed = formSchema(validProjects).safeParse(fields);
  if (!parsed.success) {
    const { issues } = parsed.error;
    // key check outranks field checks
    const issue = issues.find((i) => i.code === ZodIssueCode.unrecognized_keys) ?? issues[0];
    const reason = issue?.message ?? "invalid form data";
    throw new ValidationError(reason, `Invalid spawner options input: ${reason}`);
  }

  const v = parsed.data;
  return {
    brics_project: defuse(v.brics_project),
    runtime: defuse(v.runtime),
    ngpus: defuse(v.ngpus),
    partition: v.partition === null ? null : defuse(v.partition),
    reservation: v.reservation === null ? null : defuse(v.reservation)
  };
}

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => HTML_ENTITIES[c] ?? c);
}

/** HTML fragment for the spawn options page, one option per usable project. */
export function makeOptionsForm(projects: AuthorizationState): string {
  const options = Object.keys(projects)
    .sort()
    .map((id) => {
      const label = `${projects[id].name} (${id})`;
      return `    <option value="${escapeHtml(id)}">${escapeHtml(label)}</option>`;
    })
    .join("\n");

  return [
    `<div class="form-group">`,
    `  <label for="brics_project">Project</label>`,
    `  <select class="form-control" name="brics_project" id="brics_project" required>`,
    options,
    `  </select>`,
    `</div>`,
    `<div class="form-group">`,
    `  <label for="runtime">Runtime (HH:MM:SS)</label>`,
    `  <input class="form-control" name="runtime" id="runtime" value="01:00:00" required>`,
    `</div>`,
    `<div class="form-group">`,
    `  <label for="ngpus">GPUs</label>`,
    `  <input class="form-control" type="number" name="ngpus" id="ngpus" min="0" max="9" value="1" required>`,
    `</div>`,
    `<div class="form-group">`,
    `  <label for="partition">Partition (optional)</label>`,
    `  <input class="form-control" name="partition" id="partition" value="">`,
    `</div>`,
    `<div class="form-group">`,
    `  <label for="reservation">Reservation (optional)</label>`,
    `  <input class="form-control" name="reservation" id="reservation" value="">`,
    `</div>`
  ].join("\n");
}
