import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";

export const USAGE = `Usage: coverage-validator --institution <name> [options]

  --institution <name>   School name used in the report (required)
  --web <file>           Web scraper output JSON ({ url: { title, text_chunks } })
  --pdf <file>           PDF processor merged JSON ({ file: { metadata, content: { chunks } } })
  --taxonomy <file>      Category taxonomy JSON (default: TAXONOMY_PATH or config/taxonomy.json)
  --out <dir>            Report directory (default: REPORT_DIR or ./reports)
  --budget <chars>       Default per-category selection budget in characters
  --concurrency <n>      Categories evaluated at once
  --aggregation <mode>   fraction | confidence
  --offline              Use the keyword evaluator instead of the language model
  --raw                  Skip text cleaning of loaded chunks
  --log-dir <dir>        Also write a JSON log of the run to <dir>/validation_<school>_<timestamp>.log
  -h, --help             Show this help`;

const cliSchema = z
  .object({
    institution: z.string().trim().min(1, "required"),
    web: z.string().trim().min(1).optional(),
    pdf: z.string().trim().min(1).optional(),
    taxonomy: z.string().trim().min(1).optional(),
    out: z.string().trim().min(1).optional(),
    budget: z.coerce.number().int().positive().optional(),
    concurrency: z.coerce.number().int().positive().optional(),
    aggregation: z.enum(["fraction", "confidence"]).optional(),
    offline: z.boolean().default(false),
    raw: z.boolean().default(false),
    logDir: z.string().trim().min(1).optional(),
  })
  .refine((o) => o.web || o.pdf, { message: "at least one of --web or --pdf is required", path: ["web"] });

export type CliOptions = z.infer<typeof cliSchema>;

export type ParsedCli = { help: true } | { help: false; options: CliOptions };

export function parseCliArgs(argv: string[]): ParsedCli {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        institution: { type: "string" },
        web: { type: "string" },
        pdf: { type: "string" },
        taxonomy: { type: "string" },
        out: { type: "string" },
        budget: { type: "string" },
        concurrency: { type: "string" },
        aggregation: { type: "string" },
        offline: { type: "boolean" },
        raw: { type: "boolean" },
        "log-dir": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }));
  } catch (err) {
    throw new ConfigurationError("Invalid arguments", [err instanceof Error ? err.message : String(err)]);
  }

  if (values.help) return { help: true };

  const { "log-dir": logDir, ...rest } = values;
  const parsed = cliSchema.safeParse({ ...rest, logDir, institution: values.institution ?? "" });
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid arguments",
      parsed.error.issues.map((i) => (i.path.length ? `--${i.path.join(".")}: ${i.message}` : i.message))
    );
  }
  return { help: false, options: parsed.data };
}
