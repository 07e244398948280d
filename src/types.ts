import type { FuncId } from "./ids.ts";

export type ChanDir = "both" | "send" | "recv";

export type StructField = Readonly<{ name: string; type: IrType }>;

export type SignatureType = Readonly<{
  kind: "signature";
  params: readonly IrType[];
  results: readonly IrType[];
  // When set, the last param is a slice and renders as `...elem`.
  variadic: boolean;
}>;

export type InterfaceMethod = Readonly<{ name: string; signature: SignatureType }>;

export type InterfaceType = Readonly<{
  kind: "interface";
  // Canonical ordering is by name.
  methods: readonly InterfaceMethod[];
}>;

export type IrType =
  | Readonly<{ kind: "basic"; name: string }>
  | Readonly<{ kind: "named"; name: string }>
  | Readonly<{ kind: "pointer"; elem: IrType }>
  | Readonly<{ kind: "slice"; elem: IrType }>
  | Readonly<{ kind: "array"; len: number; elem: IrType }>
  | Readonly<{ kind: "map"; key: IrType; elem: IrType }>
  | Readonly<{ kind: "chan"; dir: ChanDir; elem: IrType }>
  | Readonly<{ kind: "struct"; fields: readonly StructField[] }>
  | InterfaceType
  | SignatureType
  | Readonly<{ kind: "tuple"; elems: readonly IrType[] }>;

export type MethodEntry = Readonly<{
  name: string;
  func: FuncId;
  pointerReceiver: boolean;
  // Without the receiver.
  signature: SignatureType;
}>;

export type NamedTypeDecl = Readonly<{
  name: string;
  // Never a named type.
  underlying: IrType;
  methods: ReadonlyMap<string, MethodEntry>;
}>;

export type TypeTable = ReadonlyMap<string, NamedTypeDecl>;

export const BASIC_TYPE_NAMES: ReadonlySet<string> = new Set([
  "bool",
  "string",
  "int",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "uintptr",
  "float32",
  "float64",
  "complex64",
  "complex128",
  "byte",
  "rune",
  "unsafe.Pointer",
]);

export const EMPTY_INTERFACE: InterfaceType = { kind: "interface", methods: [] };

export const ERROR_TYPE_NAME = "error";

export const ERROR_METHOD_SIGNATURE: SignatureType = {
  kind: "signature",
  params: [],
  results: [{ kind: "basic", name: "string" }],
  variadic: false,
};

// ---------------------------------------------------------------------------
// Rendering

const typeStringCache = new WeakMap<object, string>();

function signatureBody(sig: SignatureType): string {
  const params = sig.params.map((p, i) => {
    if (sig.variadic && i === sig.params.length - 1 && p.kind === "slice") return `...${typeString(p.elem)}`;
    return typeString(p);
  });
  const head = `(${params.join(", ")})`;
  const [only, ...rest] = sig.results;
  if (!only) return head;
  if (rest.length === 0) return `${head} ${typeString(only)}`;
  return `${head} (${sig.results.map(typeString).join(", ")})`;
}

function renderType(t: IrType): string {
  switch (t.kind) {
    case "basic":
    case "named":
      return t.name;
    case "pointer":
      return `*${typeString(t.elem)}`;
    case "slice":
      return `[]${typeString(t.elem)}`;
    case "array":
      return `[${t.len}]${typeString(t.elem)}`;
    case "map":
      return `map[${typeString(t.key)}]${typeString(t.elem)}`;
    case "chan":
      if (t.dir === "send") return `chan<- ${typeString(t.elem)}`;
      if (t.dir === "recv") return `<-chan ${typeString(t.elem)}`;
      return `chan ${typeString(t.elem)}`;
    case "struct":
      return `struct{${t.fields.map((f) => `${f.name} ${typeString(f.type)}`).join("; ")}}`;
    case "interface":
      return `interface{${t.methods.map((m) => `${m.name}${signatureBody(m.signature)}`).join("; ")}}`;
    case "signature":
      return `func${signatureBody(t)}`;
    case "tuple":
      return `(${t.elems.map(typeString).join(", ")})`;
  }
}

// Canonical rendering. Two types are identical iff their renderings are equal.
export function typeString(t: IrType): string {
  const cached = typeStringCache.get(t);
  if (cached !== undefined) return cached;
  const s = renderType(t);
  typeStringCache.set(t, s);
  return s;
}

export function typeKey(t: IrType): string {
  return typeString(t);
}

export function identicalTypes(a: IrType, b: IrType): boolean {
  return a === b || typeKey(a) === typeKey(b);
}

// ---------------------------------------------------------------------------
// Parsing

type TypeToken = Readonly<{ kind: "ident" | "int" | "punct"; text: string; pos: number }>;

const PUNCT_MULTI = ["...", "<-"] as const;
const PUNCT_SINGLE = new Set(["*", "[", "]", "(", ")", "{", "}", ",", ";"]);

function tokenizeType(text: string): TypeToken[] {
  const tokens: TypeToken[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i]!;
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const ident = /^[A-Za-z_$][A-Za-z0-9_$.]*/.exec(text.slice(i));
    if (ident) {
      tokens.push({ kind: "ident", text: ident[0], pos: i });
      i += ident[0].length;
      continue;
    }

    const int = /^[0-9]+/.exec(text.slice(i));
    if (int) {
      tokens.push({ kind: "int", text: int[0], pos: i });
      i += int[0].length;
      continue;
    }

    const multi = PUNCT_MULTI.find((p) => text.startsWith(p, i));
    if (multi) {
      tokens.push({ kind: "punct", text: multi, pos: i });
      i += multi.length;
      continue;
    }

    if (PUNCT_SINGLE.has(ch)) {
      tokens.push({ kind: "punct", text: ch, pos: i });
      i++;
      continue;
    }

    throw new Error(`Invalid type ${JSON.stringify(text)}: unexpected character ${JSON.stringify(ch)} at ${i}`);
  }
  return tokens;
}

const FIELD_NAME_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function parseType(text: string): IrType {
  const tokens = tokenizeType(text);
  let pos = 0;

  const fail = (msg: string): never => {
    const at = tokens[pos]?.pos ?? text.length;
    throw new Error(`Invalid type ${JSON.stringify(text)}: ${msg} at ${at}`);
  };

  const peekText = (offset = 0): string | undefined => tokens[pos + offset]?.text;

  const next = (): TypeToken => {
    const tok = tokens[pos];
    if (!tok) return fail("unexpected end of input");
    pos++;
    return tok;
  };

  const expect = (t: string): void => {
    const tok = tokens[pos];
    if (!tok || tok.text !== t) fail(`expected ${JSON.stringify(t)}`);
    pos++;
  };

  const isTypeStart = (): boolean => {
    const tok = tokens[pos];
    if (!tok) return false;
    if (tok.kind === "ident") return true;
    return tok.text === "*" || tok.text === "[" || tok.text === "(" || tok.text === "<-";
  };

  const parseTypeList = (close: string): IrType[] => {
    const out: IrType[] = [];
    if (peekText() === close) {
      pos++;
      return out;
    }
    for (;;) {
      out.push(parseOne());
      if (peekText() === ",") {
        pos++;
        continue;
      }
      expect(close);
      return out;
    }
  };

  const parseSignatureBody = (): SignatureType => {
    expect("(");
    const params: IrType[] = [];
    let variadic = false;
    if (peekText() === ")") {
      pos++;
    } else {
      for (;;) {
        if (variadic) fail("variadic parameter must be last");
        if (peekText() === "...") {
          pos++;
          variadic = true;
          params.push({ kind: "slice", elem: parseOne() });
        } else {
          params.push(parseOne());
        }
        if (peekText() === ",") {
          pos++;
          continue;
        }
        expect(")");
        break;
      }
    }

    let results: IrType[] = [];
    if (peekText() === "(") {
      pos++;
      results = parseTypeList(")");
    } else if (isTypeStart()) {
      results = [parseOne()];
    }
    return { kind: "signature", params, results, variadic };
  };

  const parseStruct = (): IrType => {
    expect("{");
    const fields: StructField[] = [];
    const seen = new Set<string>();
    while (peekText() !== "}") {
      const nameTok = next();
      if (nameTok.kind !== "ident" || !FIELD_NAME_RE.test(nameTok.text)) fail("expected field name");
      if (seen.has(nameTok.text)) fail(`duplicate field ${JSON.stringify(nameTok.text)}`);
      seen.add(nameTok.text);
      fields.push({ name: nameTok.text, type: parseOne() });
      if (peekText() === ";") pos++;
      else if (peekText() !== "}") fail(`expected ";" or "}"`);
    }
    pos++;
    return { kind: "struct", fields };
  };

  const parseInterface = (): IrType => {
    expect("{");
    const methods: InterfaceMethod[] = [];
    const seen = new Set<string>();
    while (peekText() !== "}") {
      const nameTok = next();
      if (nameTok.kind !== "ident" || !FIELD_NAME_RE.test(nameTok.text)) fail("expected method name");
      if (seen.has(nameTok.text)) fail(`duplicate method ${JSON.stringify(nameTok.text)}`);
      seen.add(nameTok.text);
      methods.push({ name: nameTok.text, signature: parseSignatureBody() });
      if (peekText() === ";") pos++;
      else if (peekText() !== "}") fail(`expected ";" or "}"`);
    }
    pos++;
    methods.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return { kind: "interface", methods };
  };

  const parseOne = (): IrType => {
    const tok = next();

    if (tok.text === "*") return { kind: "pointer", elem: parseOne() };

    if (tok.text === "[") {
      if (peekText() === "]") {
        pos++;
        return { kind: "slice", elem: parseOne() };
      }
      const lenTok = next();
      if (lenTok.kind !== "int") fail("expected array length");
      const len = Number(lenTok.text);
      if (!Number.isSafeInteger(len)) fail("array length is out of range");
      expect("]");
      return { kind: "array", len, elem: parseOne() };
    }

    if (tok.text === "<-") {
      expect("chan");
      return { kind: "chan", dir: "recv", elem: parseOne() };
    }

    if (tok.text === "(") return { kind: "tuple", elems: parseTypeList(")") };

    if (tok.kind !== "ident") return fail(`unexpected token ${JSON.stringify(tok.text)}`);

    switch (tok.text) {
      case "map": {
        expect("[");
        const key = parseOne();
        expect("]");
        return { kind: "map", key, elem: parseOne() };
      }
      case "chan":
        if (peekText() === "<-") {
          pos++;
          return { kind: "chan", dir: "send", elem: parseOne() };
        }
        return { kind: "chan", dir: "both", elem: parseOne() };
      case "func":
        return parseSignatureBody();
      case "struct":
        return parseStruct();
      case "interface":
        return parseInterface();
      case "any":
        return EMPTY_INTERFACE;
      default:
        break;
    }

    if (BASIC_TYPE_NAMES.has(tok.text)) return { kind: "basic", name: tok.text };

    if (peekText() === "[") {
      pos++;
      const args = parseTypeList("]");
      if (args.length === 0) fail("empty type argument list");
      return { kind: "named", name: `${tok.text}[${args.map(typeString).join(",")}]` };
    }
    return { kind: "named", name: tok.text };
  };

  if (tokens.length === 0) fail("empty type");
  const t = parseOne();
  if (pos !== tokens.length) fail(`unexpected trailing token ${JSON.stringify(tokens[pos]?.text)}`);
  return t;
}

export function parseSignature(text: string): SignatureType {
  const t = parseType(text);
  if (t.kind !== "signature") throw new Error(`Expected a func type; got ${JSON.stringify(text)}`);
  return t;
}

// ---------------------------------------------------------------------------
// Queries over a type table

export function namedTypeDecl(name: string, table: TypeTable): NamedTypeDecl {
  const decl = table.get(name);
  if (!decl) throw new Error(`Unknown named type: ${JSON.stringify(name)}`);
  return decl;
}

export function underlying(t: IrType, table: TypeTable): IrType {
  return t.kind === "named" ? namedTypeDecl(t.name, table).underlying : t;
}

export function asInterface(t: IrType, table: TypeTable): InterfaceType | null {
  const u = underlying(t, table);
  return u.kind === "interface" ? u : null;
}

export function asSignature(t: IrType, table: TypeTable): SignatureType | null {
  const u = underlying(t, table);
  return u.kind === "signature" ? u : null;
}

export function isInterfaceType(t: IrType, table: TypeTable): boolean {
  return asInterface(t, table) !== null;
}

export function isFunctionType(t: IrType, table: TypeTable): boolean {
  return asSignature(t, table) !== null;
}

// Returns the interface type reached through one or more pointers, e.g. I for **I.
export function interfaceUnderPtr(t: IrType, table: TypeTable): IrType | null {
  const u = underlying(t, table);
  if (u.kind !== "pointer") return null;
  const e = underlying(u.elem, table);
  if (e.kind === "interface") return u.elem;
  if (e.kind === "pointer") return interfaceUnderPtr(u.elem, table);
  return null;
}

export function functionUnderPtr(t: IrType, table: TypeTable): IrType | null {
  const u = underlying(t, table);
  if (u.kind !== "pointer") return null;
  const e = underlying(u.elem, table);
  if (e.kind === "signature") return u.elem;
  if (e.kind === "pointer") return functionUnderPtr(u.elem, table);
  return null;
}

export function canHaveMethods(t: IrType, table: TypeTable): boolean {
  if (t.kind === "named") return true;
  if (t.kind === "pointer" && t.elem.kind === "named") return true;
  const u = underlying(t, table);
  return u.kind === "interface" || u.kind === "signature" || u.kind === "struct";
}

// Method set lookup for concrete types: T has its value-receiver methods, *T has all of T's methods.
export function lookupMethod(t: IrType, name: string, table: TypeTable): MethodEntry | null {
  if (t.kind === "named") {
    const m = namedTypeDecl(t.name, table).methods.get(name);
    return m && !m.pointerReceiver ? m : null;
  }
  if (t.kind === "pointer" && t.elem.kind === "named") {
    return namedTypeDecl(t.elem.name, table).methods.get(name) ?? null;
  }
  return null;
}

export function implementsInterface(t: IrType, iface: InterfaceType, table: TypeTable): boolean {
  for (const im of iface.methods) {
    const m = lookupMethod(t, im.name, table);
    if (!m) return false;
    if (!identicalTypes(m.signature, im.signature)) return false;
  }
  return true;
}

// Element type of a slice, an array, or a pointer to an array. Strings have no interesting elements.
export function sliceArrayElem(t: IrType, table: TypeTable): IrType | null {
  const u = underlying(t, table);
  if (u.kind === "slice" || u.kind === "array") return u.elem;
  if (u.kind === "pointer") {
    const e = underlying(u.elem, table);
    if (e.kind === "array") return e.elem;
  }
  return null;
}

export function isStringType(t: IrType, table: TypeTable): boolean {
  const u = underlying(t, table);
  return u.kind === "basic" && u.name === "string";
}
