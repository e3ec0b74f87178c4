/**
 * Extraction paths
 *
 * A subset of XPath abbreviated syntax evaluated over a parsed document:
 *
 *   /a/b        child steps from the document node
 *   a/b, ./a/b  child steps from the root element
 *   //a, .//a   descendants at any depth (also allowed mid-path: a//b)
 *   *           any element
 *   a[2]        1-based position among the matching children of each parent
 *   text()      text content of the selected elements (last step only)
 *   @name       attribute value of the selected elements (last step only)
 *
 * Step prefixes (`soap:Body`) must match the document's prefix unless
 * namespaces are stripped; unprefixed steps match on local name.
 */

import { PreconditionError } from '../errors.js';
import { ATTRIBUTE_PREFIX, TEXT_KEY, isXmlNode, localName, textOf, type XmlNode, type XmlValue } from './xml.js';

type Axis = 'child' | 'descendant';

interface ElementStep {
  readonly kind: 'element';
  readonly axis: Axis;
  readonly prefix?: string;
  /** Local name, or `*` */
  readonly local: string;
  readonly position?: number;
}

interface TextStep {
  readonly kind: 'text';
}

interface AttributeStep {
  readonly kind: 'attribute';
  readonly prefix?: string;
  readonly local: string;
}

type Step = ElementStep | TextStep | AttributeStep;

export interface CompiledPath {
  readonly source: string;
  readonly fromDocument: boolean;
  readonly steps: readonly Step[];
}

export interface EvaluateOptions {
  stripNamespaces?: boolean;
}

const ELEMENT_STEP = /^(\*|(?:([A-Za-z_][\w.-]*):)?([A-Za-z_][\w.-]*))(?:\[(\d+)\])?$/;
const ATTRIBUTE_STEP = /^@(?:([A-Za-z_][\w.-]*):)?([A-Za-z_][\w.-]*)$/;

function invalid(path: string, reason: string): PreconditionError {
  return new PreconditionError(`Invalid extraction path '${path}': ${reason}`);
}

/**
 * Compile a path expression.
 *
 * @throws PreconditionError when the expression is outside the supported subset
 */
export function compileExtractPath(path: string): CompiledPath {
  let rest = path.trim();
  if (rest === '') {
    throw invalid(path, 'expression is empty');
  }

  let fromDocument = false;
  let axis: Axis = 'child';
  if (rest.startsWith('.//')) {
    fromDocument = true;
    axis = 'descendant';
    rest = rest.slice(3);
  } else if (rest.startsWith('//')) {
    fromDocument = true;
    axis = 'descendant';
    rest = rest.slice(2);
  } else if (rest.startsWith('/')) {
    fromDocument = true;
    rest = rest.slice(1);
  } else if (rest.startsWith('./')) {
    rest = rest.slice(2);
  }

  const segments = rest.split('/');
  const steps: Step[] = [];

  segments.forEach((segment, index) => {
    const last = index === segments.length - 1;

    if (segment === '') {
      if (last || axis === 'descendant') {
        throw invalid(path, 'empty step');
      }
      axis = 'descendant';
      return;
    }

    if (segment === '.') {
      return;
    }

    if (segment === 'text()') {
      if (!last) throw invalid(path, 'text() must be the last step');
      steps.push({ kind: 'text' });
      return;
    }

    const attribute = ATTRIBUTE_STEP.exec(segment);
    if (attribute) {
      if (!last) throw invalid(path, 'an attribute must be the last step');
      steps.push({ kind: 'attribute', prefix: attribute[1], local: attribute[2] ?? '' });
      return;
    }

    const element = ELEMENT_STEP.exec(segment);
    if (!element) {
      throw invalid(path, `unsupported step '${segment}'`);
    }

    const position = element[4] === undefined ? undefined : Number(element[4]);
    if (position === 0) {
      throw invalid(path, 'positions start at 1');
    }

    steps.push({
      kind: 'element',
      axis,
      prefix: element[2],
      local: element[1] === '*' ? '*' : element[3] ?? '',
      position,
    });
    axis = 'child';
  });

  if (steps.length === 0) {
    throw invalid(path, 'no steps');
  }

  return { source: path, fromDocument, steps };
}

/**
 * Element wrapper with memoized children, so node identity survives
 * repeated traversal.
 */
class PathNode {
  private childCache?: PathNode[];

  constructor(
    readonly name: string,
    readonly value: XmlValue
  ) {}

  children(): PathNode[] {
    if (!this.childCache) {
      this.childCache = [];
      if (isXmlNode(this.value)) {
        for (const [key, child] of Object.entries(this.value)) {
          if (key.startsWith(ATTRIBUTE_PREFIX) || key === TEXT_KEY) continue;
          const items = Array.isArray(child) ? child : [child];
          for (const item of items) {
            this.childCache.push(new PathNode(key, item));
          }
        }
      }
    }
    return this.childCache;
  }

  /** This node and every element below it, in document order */
  selfAndDescendants(): PathNode[] {
    const all: PathNode[] = [this];
    for (const child of this.children()) {
      all.push(...child.selfAndDescendants());
    }
    return all;
  }
}

function nameMatches(
  step: { prefix?: string; local: string },
  qualified: string,
  stripNamespaces: boolean
): boolean {
  if (step.local === '*') return true;
  if (localName(qualified) !== step.local) return false;
  return stripNamespaces || step.prefix === undefined || qualified === `${step.prefix}:${step.local}`;
}

function applyElementStep(context: PathNode[], step: ElementStep, stripNamespaces: boolean): PathNode[] {
  const parents = step.axis === 'descendant' ? context.flatMap((node) => node.selfAndDescendants()) : context;

  const seen = new Set<PathNode>();
  const selected: PathNode[] = [];
  for (const parent of parents) {
    if (seen.has(parent) && step.axis === 'descendant') continue;
    seen.add(parent);

    const matches = parent.children().filter((child) => nameMatches(step, child.name, stripNamespaces));
    const picked = step.position === undefined ? matches : matches.slice(step.position - 1, step.position);
    for (const node of picked) {
      if (!selected.includes(node)) selected.push(node);
    }
  }
  return selected;
}

function attributeValue(node: XmlNode, step: AttributeStep, stripNamespaces: boolean): string | undefined {
  for (const [key, value] of Object.entries(node)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX) || typeof value !== 'string') continue;
    if (nameMatches(step, key.slice(ATTRIBUTE_PREFIX.length), stripNamespaces)) {
      return value;
    }
  }
  return undefined;
}

/**
 * Evaluate a path against a parsed document. Returns undefined when nothing
 * matches, the value for one match and an array for several.
 */
export function evaluateExtractPath(
  document: XmlNode,
  path: string | CompiledPath,
  options: EvaluateOptions = {}
): XmlValue | undefined {
  const compiled = typeof path === 'string' ? compileExtractPath(path) : path;
  const stripNamespaces = options.stripNamespaces ?? false;

  const documentNode = new PathNode('#document', document);
  let context: PathNode[];
  if (compiled.fromDocument) {
    context = [documentNode];
  } else {
    const root = documentNode.children()[0];
    context = root ? [root] : [];
  }

  const values: XmlValue[] = [];
  for (const step of compiled.steps) {
    if (step.kind === 'element') {
      context = applyElementStep(context, step, stripNamespaces);
      continue;
    }
    for (const node of context) {
      const value =
        step.kind === 'text'
          ? textOf(Array.isArray(node.value) ? undefined : node.value)
          : isXmlNode(node.value)
            ? attributeValue(node.value, step, stripNamespaces)
            : undefined;
      if (value !== undefined) values.push(value);
    }
    context = [];
  }

  const last = compiled.steps[compiled.steps.length - 1];
  if (last?.kind === 'element') {
    values.push(...context.map((node) => node.value));
  }

  if (values.length === 0) return undefined;
  return values.length === 1 ? values[0] : values;
}
