import { YAMLParseError, parse as parseYaml } from "yaml";

/** Parses YAML, prefixing parse errors with `file:line:col`. */
export function parseYamlWithDiagnostics(raw: string, fileHint = "yaml"): unknown {
  try {
    return parseYaml(raw);
  } catch (err) {
    if (!(err instanceof YAMLParseError)) throw err;
    const pos = err.linePos?.[0];
    const where = pos ? `${fileHint}:${pos.line}:${pos.col}` : fileHint;
    throw new Error(`${where}: ${err.message}`);
  }
}
