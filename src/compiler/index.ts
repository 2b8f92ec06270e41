import {
  AnyC,
  BoolC,
  CallableC,
  ConfigurationError,
  Contract,
  DictC,
  EmailC,
  EnumC,
  FloatC,
  ForwardC,
  IntC,
  IsoDateC,
  ListC,
  MappingC,
  NullC,
  NumberC,
  OrC,
  StringC,
  WILDCARD,
} from '../contracts';
import { type ContractNodeType, issue, parse_definition } from '../schema';
import type { CompileInput, CompileOutput, ValidationIssue } from '../types';

/** 编译过程中共享的上下文 */
interface BuildCtx {
  /** 具名定义 → 占位 ForwardC（先全部声明，再逐个绑定，以支持自引用/互引用） */
  forwards: Map<string, ForwardC>;
  /** 被 ref 过的定义名 */
  referenced: Set<string>;
  add_error: (code: string, path: string, message: string) => void;
  add_warning: (code: string, path: string, message: string) => void;
}

/** 无参数叶子类型的构造表 */
const SIMPLE_FACTORIES: Record<string, () => Contract> = {
  any: () => new AnyC(),
  null: () => new NullC(),
  bool: () => new BoolC(),
  number: () => new NumberC(),
  email: () => new EmailC(),
  iso_date: () => new IsoDateC(),
  callable: () => new CallableC(),
};

/** 调用 contract 构造器；ConfigurationError 记为 INVALID_OPTIONS，返回 null */
function construct(ctx: BuildCtx, path: string, make: () => Contract): Contract | null {
  try {
    return make();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      ctx.add_error('INVALID_OPTIONS', path, err.message);
      return null;
    }
    throw err;
  }
}

/**
 * 把一个定义节点编译成 contract。
 * 出错时记录 issue 并返回 null；调用方只要看到 null 就放弃当前分支，
 * 但仍继续编译兄弟节点，以便一次收集尽可能多的问题。
 */
function build_node(node: ContractNodeType, path: string, ctx: BuildCtx): Contract | null {
  switch (node.type) {
    case 'any':
    case 'null':
    case 'bool':
    case 'number':
    case 'email':
    case 'iso_date':
    case 'callable':
      return SIMPLE_FACTORIES[node.type]();

    case 'int':
    case 'float': {
      const bounds = { gte: node.gte, lte: node.lte, gt: node.gt, lt: node.lt };
      const is_int = node.type === 'int';
      return construct(ctx, path, () => (is_int ? new IntC(bounds) : new FloatC(bounds)));
    }

    case 'string':
      return new StringC({ allow_blank: node.allow_blank });

    case 'enum':
      return new EnumC(...node.values);

    case 'or': {
      const branches = node.any_of.map((n, i) => build_node(n, `${path}/any_of/${i}`, ctx));
      if (branches.some((b) => b === null)) return null;
      return new OrC(...branches.filter((b): b is Contract => b !== null));
    }

    case 'list': {
      const item = build_node(node.of, `${path}/of`, ctx);
      if (!item) return null;
      const options = { min_length: node.min_length, max_length: node.max_length };
      return construct(ctx, path, () => new ListC(item, options));
    }

    case 'dict': {
      const { fields } = node;
      const shape: Record<string, Contract> = {};
      let broken = false;
      for (const [key, child] of Object.entries(fields)) {
        const built = build_node(child, `${path}/fields/${key}`, ctx);
        if (built) shape[key] = built;
        else broken = true;
      }

      // 语义告警：optional 中未声明的键、extras 与 fields 重叠
      (node.optional ?? []).forEach((key, i) => {
        if (key !== WILDCARD && !Object.hasOwn(fields, key)) {
          ctx.add_warning('OPTIONAL_KEY_UNDECLARED', `${path}/optional/${i}`, `optional key '${key}' is not declared in fields`);
        }
      });
      (node.extras ?? []).forEach((key, i) => {
        if (Object.hasOwn(fields, key)) {
          ctx.add_warning('EXTRA_KEY_DECLARED', `${path}/extras/${i}`, `extra key '${key}' is already declared in fields`);
        }
      });

      if (broken) return null;
      return new DictC(shape, {
        optionals: node.optional,
        extras: node.extras,
        allow_any: node.allow_any,
      });
    }

    case 'mapping': {
      const keys = build_node(node.keys, `${path}/keys`, ctx);
      const values = build_node(node.values, `${path}/values`, ctx);
      if (!keys || !values) return null;
      return new MappingC(keys, values);
    }

    case 'ref': {
      const target = ctx.forwards.get(node.name);
      if (!target) {
        ctx.add_error('UNKNOWN_REF', `${path}/name`, `definition '${node.name}' is not declared`);
        return null;
      }
      ctx.referenced.add(node.name);
      return target;
    }
  }
}

/** 节点在不进入 list / dict / mapping 的情况下直接引用到的定义名 */
function unguarded_refs(node: ContractNodeType, out = new Set<string>()): Set<string> {
  if (node.type === 'ref') out.add(node.name);
  if (node.type === 'or') node.any_of.forEach((branch) => unguarded_refs(branch, out));
  return out;
}

/** graph 中从 from 出发（至少走一步）能否到达 to */
function reaches(graph: ReadonlyMap<string, ReadonlySet<string>>, from: string, to: string): boolean {
  const seen = new Set<string>();
  const stack = [...(graph.get(from) ?? [])];
  while (stack.length) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    if (next === to) return true;
    seen.add(next);
    stack.push(...(graph.get(next) ?? []));
  }
  return false;
}

/**
 * 编译 contract 定义文档：
 *  1. zod 结构校验（失败 → SCHEMA_ERROR）
 *  2. 为每个具名定义创建 ForwardC 占位
 *  3. 编译各定义并绑定，再编译 root
 *  4. 语义告警（未使用的定义等）；strict 模式下告警升级为错误
 */
export function compile(input: CompileInput): CompileOutput {
  const t0 = Date.now();
  const result = parse_definition(input.definition);
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const fail = (): CompileOutput => ({
    ok: false,
    contract: null,
    definitions: {},
    errors,
    warnings,
    time_ms: Date.now() - t0,
  });

  if (!result.success) {
    // 把 Zod 的 issues 转成 ValidationIssue[]
    for (const e of result.error.issues) {
      errors.push(issue('SCHEMA_ERROR', '/' + e.path.join('/'), e.message));
    }
    return fail();
  }

  const doc = result.data;
  const ctx: BuildCtx = {
    forwards: new Map(),
    referenced: new Set(),
    add_error: (code, path, message) => errors.push(issue(code, path, message)),
    add_warning: (code, path, message) => warnings.push(issue(code, path, message)),
  };

  const definitions = Object.entries(doc.definitions ?? {});
  for (const [name] of definitions) {
    ctx.forwards.set(name, new ForwardC());
  }

  // 不经过 list / dict / mapping 就回到自身的定义（ref 链、or 分支里的 ref）
  // 校验时不会消耗任何嵌套层级，只会无限递归
  const graph = new Map<string, Set<string>>();
  for (const [name, node] of definitions) {
    graph.set(name, unguarded_refs(node));
  }
  for (const [name] of definitions) {
    if (reaches(graph, name, name)) {
      errors.push(
        issue('CIRCULAR_REF', `/definitions/${name}`, `definition '${name}' refers back to itself without nesting`)
      );
    }
  }

  for (const [name, node] of definitions) {
    const built = build_node(node, `/definitions/${name}`, ctx);
    if (built) ctx.forwards.get(name)?.define(built);
  }

  const root = build_node(doc.root, '/root', ctx);

  for (const [name] of definitions) {
    if (!ctx.referenced.has(name)) {
      warnings.push(issue('UNUSED_DEFINITION', `/definitions/${name}`, `definition '${name}' is never referenced`));
    }
  }

  if (input.options?.strict && warnings.length) {
    errors.push(...warnings.splice(0, warnings.length));
  }

  if (errors.length || !root) return fail();

  return {
    ok: true,
    contract: root,
    definitions: Object.fromEntries(ctx.forwards),
    errors,
    warnings,
    time_ms: Date.now() - t0,
  };
}
