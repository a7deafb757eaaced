export { CommanderConfig, type CommanderConfigOptions } from "./adapters/commander/commander-config"
export { DotenvConfig, type DotenvConfigOptions } from "./adapters/dotenv/dotenv-config"
export { EnvConfig, type EnvConfigOptions } from "./adapters/env/env-config"
export { JsonConfig, type JsonConfigOptions } from "./adapters/json/json-config"
export { ObjectConfig } from "./adapters/object/object-config"
export { TomlConfig, type TomlConfigOptions } from "./adapters/toml/toml-config"
export { YamlConfig, type YamlConfigOptions } from "./adapters/yaml/yaml-config"
export { identity, pipeline, relpath, type RelpathOptions, schema } from "./core/apply"
export { BaseConfig, type BaseConfigOptions } from "./core/base-config"
export { BaseFileConfig, type FileConfigOptions } from "./core/base-file-config"
export {
  arithmeticEval,
  ExpressionError,
  floatEval,
  intEval,
  type Variables,
} from "./core/cast/arithmetic-eval"
export { flattenConfigs, isConfig } from "./core/config-tree"
export {
  ApplyError,
  CircularDependencyError,
  ConfigLoadError,
  KeyNotFoundError,
  NoValueFoundError,
  PickError,
  ResolutionError,
  type UnresolvedParam,
  UsageError,
} from "./core/errors"
export {
  ConfigAttrGetter,
  configAttr,
  FuncGetter,
  func,
  type GetterOptions,
  KeyGetter,
  key,
  type MethodFn,
  MethodGetter,
  method,
  ValueGetter,
  value,
} from "./core/getters"
export { formatKeyPath, lookup, parseKeyPath } from "./core/key-path"
export { LoadReport, Loader, type LoaderOptions, load } from "./core/loader"
export { describeOrigin, describePicked } from "./core/origin"
export { Param, type ParamOptions, param } from "./core/param"
export { all, first, mergeMappings, type PickPolicy, pickPolicies } from "./core/pick"
export {
  loadCollection,
  recursiveLoad,
  recursiveLoadFromDictValues,
  recursiveLoadFromList,
} from "./core/recursive"
export {
  type Class,
  type ConfigProvider,
  defineConfigs,
  defineParams,
  type ParamDeclarations,
} from "./core/registry"
export { CandidateValues } from "./core/values-iter"
export type { ApplyContext, ApplyFn } from "./ports/apply"
export type {
  Config,
  ConfigSelector,
  ConfigTree,
  FileConfig,
  KeyPath,
  KeyPathInput,
  KeySegment,
} from "./ports/config"
export type { Found, Getter, Origin, ResolveContext } from "./ports/getter"
export type { OnLoadContext, OnLoadFn, PickedOrigin, PickFn, ValuesIter } from "./ports/pick"
