import {
  defineStatement,
  invalidArgument,
  parseRevision,
  stringArgument,
  SubstatementValidator,
  type RevisionDate,
  type SourceLocation,
  type StatementDefinition,
} from "@schema-reactor/compiler";

function revisionArgument(raw: string | null, location: SourceLocation): RevisionDate {
  const revision = parseRevision(raw);
  if (!revision) throw invalidArgument(location, `'${raw ?? ""}' is not a YYYY-MM-DD revision date`);
  return revision;
}

const URI_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:\S+$/;

export const namespaceStatement = defineStatement<string>({
  keyword: "namespace",
  parseArgument(raw, location) {
    const uri = stringArgument(raw, location);
    if (!URI_PATTERN.test(uri)) throw invalidArgument(location, `'${uri}' is not a URI`);
    return uri;
  },
});

export const prefixStatement = defineStatement<string>({
  keyword: "prefix",
  parseArgument(raw, location) {
    const prefix = stringArgument(raw, location);
    if (prefix.includes(":")) throw invalidArgument(location, `Prefix '${prefix}' may not contain ':'`);
    return prefix;
  },
});

export const revisionStatement = defineStatement<RevisionDate>({
  keyword: "revision",
  parseArgument: revisionArgument,
  validator: SubstatementValidator.builder("revision").addOptional("description").addOptional("reference").build(),
});

export const revisionDateStatement = defineStatement<RevisionDate>({
  keyword: "revision-date",
  parseArgument: revisionArgument,
});

function textStatement(keyword: string): StatementDefinition<string> {
  return defineStatement<string>({ keyword, parseArgument: stringArgument });
}

export const organizationStatement = textStatement("organization");
export const contactStatement = textStatement("contact");
export const descriptionStatement = textStatement("description");
export const referenceStatement = textStatement("reference");
