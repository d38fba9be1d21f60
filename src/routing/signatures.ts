import ts from 'typescript';

// ============================================================================
// Types
// ============================================================================

export type FunctionLike = ts.FunctionDeclaration | ts.ArrowFunction | ts.FunctionExpression;

/** An exported function found in a routing file, before validation. */
export interface ExportedFunction {
  name: string;
  node: FunctionLike;
  /** Annotation on `export const name: T = ...`, when present. */
  declaredType?: ts.TypeNode;
}

export type SignatureResult =
  | { valid: true }
  | { valid: false; reason: string };

const VALID: SignatureResult = { valid: true };

function invalid(reason: string): SignatureResult {
  return { valid: false, reason };
}

// ============================================================================
// Type node helpers
// ============================================================================

function unwrapParens(node: ts.TypeNode): ts.TypeNode {
  let current = node;
  while (ts.isParenthesizedTypeNode(current)) current = current.type;
  return current;
}

/**
 * Name of a referenced type, ignoring the qualifier:
 * both `Context` and `kiln.Context` give `Context`.
 */
export function referencedTypeName(node: ts.TypeNode | undefined): string | null {
  if (!node) return null;
  const type = unwrapParens(node);
  if (!ts.isTypeReferenceNode(type)) return null;
  const name = type.typeName;
  return ts.isIdentifier(name) ? name.text : name.right.text;
}

function isReferenceTo(node: ts.TypeNode | undefined, name: string): boolean {
  return referencedTypeName(node) === name;
}

function promiseInner(node: ts.TypeNode): ts.TypeNode | null {
  const type = unwrapParens(node);
  if (!ts.isTypeReferenceNode(type) || referencedTypeName(type) !== 'Promise') return null;
  const args = type.typeArguments;
  return args && args.length === 1 ? args[0] : null;
}

function isVoidLike(node: ts.TypeNode): boolean {
  const kind = unwrapParens(node).kind;
  return kind === ts.SyntaxKind.VoidKeyword || kind === ts.SyntaxKind.UndefinedKeyword;
}

function describeType(node: ts.TypeNode | undefined): string {
  return node ? node.getText() : '(none)';
}

// ============================================================================
// Shared parameter check
// ============================================================================

function checkSingleParam(fn: FunctionLike, typeName: string): SignatureResult {
  const params = fn.parameters;
  if (params.length !== 1) {
    return invalid(`expected exactly 1 parameter of type ${typeName}, found ${params.length}`);
  }

  const param = params[0];
  if (param.dotDotDotToken) {
    return invalid(`parameter must be a single ${typeName}, not a rest parameter`);
  }
  if (!isReferenceTo(param.type, typeName)) {
    return invalid(`parameter must be typed ${typeName}, found ${describeType(param.type)}`);
  }

  return VALID;
}

// ============================================================================
// Contracts
// ============================================================================

function isHandlerReturn(node: ts.TypeNode): boolean {
  if (isVoidLike(node) || isReferenceTo(node, 'HandlerResult')) return true;
  const inner = promiseInner(node);
  return inner !== null && (isVoidLike(inner) || isReferenceTo(inner, 'HandlerResult'));
}

/** `(ctx: Context) => HandlerResult`, where HandlerResult is `void | Promise<void>`. */
export function checkHandlerSignature(fn: ExportedFunction): SignatureResult {
  if (fn.declaredType) {
    return isReferenceTo(fn.declaredType, 'HandlerFunc')
      ? VALID
      : invalid(`declared type must be HandlerFunc, found ${describeType(fn.declaredType)}`);
  }

  const params = checkSingleParam(fn.node, 'Context');
  if (!params.valid) return params;

  const returnType = fn.node.type;
  if (returnType && !isHandlerReturn(returnType)) {
    return invalid(`return type must be void, Promise<void> or HandlerResult, found ${describeType(returnType)}`);
  }

  return VALID;
}

/** `(next: HandlerFunc) => HandlerFunc`. */
export function checkMiddlewareSignature(fn: ExportedFunction): SignatureResult {
  if (fn.declaredType) {
    return isReferenceTo(fn.declaredType, 'MiddlewareFunc')
      ? VALID
      : invalid(`declared type must be MiddlewareFunc, found ${describeType(fn.declaredType)}`);
  }

  const params = checkSingleParam(fn.node, 'HandlerFunc');
  if (!params.valid) return params;

  const returnType = fn.node.type;
  if (returnType && !isReferenceTo(returnType, 'HandlerFunc')) {
    return invalid(`return type must be HandlerFunc, found ${describeType(returnType)}`);
  }

  return VALID;
}

function isProxyResultUnion(node: ts.TypeNode): boolean {
  const type = unwrapParens(node);
  if (isReferenceTo(type, 'ProxyResult')) return true;
  if (!ts.isUnionTypeNode(type)) return false;

  let sawResult = false;
  for (const member of type.types) {
    if (isReferenceTo(member, 'ProxyResult')) {
      sawResult = true;
    } else if (!isVoidLike(member)) {
      return false;
    }
  }
  return sawResult;
}

/** `(ctx: Context) => ProxyResult | undefined`, optionally async. */
export function checkProxySignature(fn: ExportedFunction): SignatureResult {
  if (fn.declaredType) {
    return isReferenceTo(fn.declaredType, 'ProxyFunc')
      ? VALID
      : invalid(`declared type must be ProxyFunc, found ${describeType(fn.declaredType)}`);
  }

  const params = checkSingleParam(fn.node, 'Context');
  if (!params.valid) return params;

  const returnType = fn.node.type;
  if (!returnType) return VALID;

  const inner = promiseInner(returnType);
  if (!isProxyResultUnion(inner ?? returnType)) {
    return invalid(`return type must be ProxyResult or Promise<ProxyResult>, found ${describeType(returnType)}`);
  }

  return VALID;
}
