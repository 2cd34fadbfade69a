import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const augmentHint: DiagnosticHint = {
  message:
    "Mark the later declaration with 'augment' to extend the earlier one instead of redeclaring it.",
};

type DiagnosticParamsMap = {
  BD0001:
    | { kind: "duplicated-declaration"; name: string }
    | { kind: "previous-declaration"; name: string };
  BD0002: {
    kind: "member-shares-declaration-name";
    name: string;
    declarationKind: string;
  };
  BD0003:
    | { kind: "conflicts-with-type-parameter"; name: string }
    | { kind: "type-parameter-declared-here" };
  BD0004:
    | { kind: "duplicated-type-parameter"; name: string }
    | { kind: "previous-type-parameter"; name: string };
  BD0005: { kind: "type-parameter-shares-declaration-name"; name: string };
  SR0001: { kind: "type-not-found"; name: string };
  SR0002: { kind: "not-a-type"; name: string; declarationKind: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  BD0001: {
    code: "BD0001",
    message: (params) => {
      switch (params.kind) {
        case "duplicated-declaration":
          return `'${params.name}' is already declared in this scope`;
        case "previous-declaration":
          return `previous declaration of '${params.name}'`;
      }
      return exhaustive(params);
    },
    severity: "error",
    hints: [augmentHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0001"]>,
  BD0002: {
    code: "BD0002",
    message: (params) =>
      `member '${params.name}' has the same name as the enclosing ${params.declarationKind}`,
    severity: "warning",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0002"]>,
  BD0003: {
    code: "BD0003",
    message: (params) =>
      params.kind === "conflicts-with-type-parameter"
        ? `'${params.name}' conflicts with a type parameter of the enclosing declaration`
        : "type parameter declared here",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0003"]>,
  BD0004: {
    code: "BD0004",
    message: (params) => {
      switch (params.kind) {
        case "duplicated-type-parameter":
          return `type parameter '${params.name}' is declared more than once`;
        case "previous-type-parameter":
          return `previous declaration of type parameter '${params.name}'`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0004"]>,
  BD0005: {
    code: "BD0005",
    message: (params) =>
      `type parameter '${params.name}' has the same name as the enclosing declaration`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0005"]>,
  SR0001: {
    code: "SR0001",
    message: (params) => `type '${params.name}' not found`,
    severity: "error",
    phase: "scope-resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SR0001"]>,
  SR0002: {
    code: "SR0002",
    message: (params) =>
      `'${params.name}' is ${articleFor(params.declarationKind)} ${params.declarationKind}, not a type`,
    severity: "error",
    phase: "scope-resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SR0002"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry) as DiagnosticCode[];

const articleFor = (noun: string): string =>
  /^[aeiou]/i.test(noun) ? "an" : "a";

const exhaustive = (_value: never): never => _value;
