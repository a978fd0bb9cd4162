import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const packageMetaSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional()
});

type PackageMeta = z.infer<typeof packageMetaSchema>;

export function readPackageMeta(): PackageMeta {
  const candidates = [
    path.resolve(__dirname, "../../package.json"),
    path.resolve(__dirname, "../package.json")
  ];

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const parsed = packageMetaSchema.safeParse(JSON.parse(fs.readFileSync(candidate, "utf8")));
    if (parsed.success) {
      return parsed.data;
    }
  }

  return {};
}
