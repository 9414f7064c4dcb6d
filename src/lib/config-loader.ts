/**
 * Sun Config Loader
 *
 * Loads `.sun/config.yaml` (plus `config.local.yaml`) from the project or the
 * home directory and applies SUN_* environment overrides. The result is
 * resolved once at the entry point and passed down explicitly.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import type { SettingSource, SunSettings } from '../types.js'
import { InvalidConfigError } from './errors.js'
import { formatIssues } from './schema-utils.js'

const CONFIG_DIR = '.sun'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5

export type EnvMap = Record<string, string | undefined>

export interface LoadedConfig {
  settings: SunSettings
  /** Path of the config.yaml that was read, if any */
  configPath: string | null
  sources: Partial<Record<keyof SunSettings, SettingSource>>
}

export interface LoadConfigOptions {
  startDir?: string
  env?: EnvMap
  homeDir?: string
}

/**
 * Truthy values for boolean switches: 1, true, yes, on
 */
export function isTruthy(value: string | undefined): boolean {
  switch ((value ?? '').trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true
    default:
      return false
  }
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: EnvMap): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] || '')

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => env[varName] || '')

  return str
}

function expandEnvVarsInValue(value: unknown, env: EnvMap): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, env))
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item, env)
    }
    return result
  }
  return value
}

const blankToUndefined = (value: unknown): unknown =>
  value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value

const optionalString = z.preprocess(
  blankToUndefined,
  z.union([z.string(), z.number()]).transform(value => String(value).trim()).optional()
)

const optionalInt = z.preprocess(
  blankToUndefined,
  z
    .union([z.number().int(), z.string().trim().regex(/^-?\d+$/, 'expected an integer').transform(Number)])
    .optional()
)

const optionalBool = z.preprocess(
  blankToUndefined,
  z.union([z.boolean(), z.string().transform(value => isTruthy(value))]).optional()
)

const settingsSchema = z.object({
  base_url: optionalString,
  token: optionalString,
  allow_insecure_http: optionalBool,
  timeout_seconds: optionalInt,
  taskboard: optionalString,
  taskboard_agent: optionalString,
  taskboard_lease_seconds: optionalInt,
  machine_id: optionalString,
  operator_id: optionalString,
  vault_file: optionalString,
  vault_backup: optionalString,
  gateway_registry: optionalString,
  gateway_slots: optionalInt
})

const configFileSchema = z
  .object({
    sun: z.preprocess(value => value ?? {}, settingsSchema)
  })
  .passthrough()

/**
 * Find the .sun directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    if (fs.existsSync(path.join(configDir, CONFIG_FILE))) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, env: EnvMap): SunSettings {
  if (!fs.existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError(err instanceof Error ? err.message : String(err), configPath, err)
  }

  const result = configFileSchema.safeParse(expandEnvVarsInValue(parsed ?? {}, env))
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error), configPath)
  }
  return result.data.sun
}

function mergeSettings(base: SunSettings, overlay: SunSettings): SunSettings {
  const merged: SunSettings = { ...base }
  for (const [key, value] of Object.entries(overlay)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value })
    }
  }
  return merged
}

function positiveInt(raw: string | undefined): number | undefined {
  const value = (raw ?? '').trim()
  if (!/^\d+$/.test(value)) return undefined
  const parsed = Number(value)
  return parsed > 0 ? parsed : undefined
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = (raw ?? '').trim()
  return value === '' ? undefined : value
}

/**
 * SUN_* environment overrides, in the same shape as settings
 */
export function settingsFromEnv(env: EnvMap): SunSettings {
  const settings: SunSettings = {
    base_url: nonEmpty(env.SUN_BASE_URL),
    token: nonEmpty(env.SUN_TOKEN),
    allow_insecure_http: isTruthy(env.SUN_ALLOW_INSECURE_HTTP) ? true : undefined,
    timeout_seconds: positiveInt(env.SUN_TIMEOUT_SECONDS),
    taskboard: nonEmpty(env.SUN_TASKBOARD),
    taskboard_agent: nonEmpty(env.SUN_TASKBOARD_AGENT),
    taskboard_lease_seconds: positiveInt(env.SUN_TASKBOARD_LEASE_SECONDS),
    machine_id: nonEmpty(env.SUN_MACHINE_ID),
    operator_id: nonEmpty(env.SUN_OPERATOR_ID),
    vault_file: nonEmpty(env.SUN_VAULT_FILE),
    vault_backup: nonEmpty(env.SUN_VAULT_BACKUP),
    gateway_registry: nonEmpty(env.SUN_GATEWAY_REGISTRY),
    gateway_slots: positiveInt(env.SUN_GATEWAY_SLOTS)
  }
  return mergeSettings({}, settings)
}

/**
 * Load settings from config files and the environment
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env
  const homeDir = options.homeDir ?? os.homedir()

  let configDir = findConfigDir(options.startDir)
  if (!configDir) {
    const homeConfigDir = path.join(homeDir, CONFIG_DIR)
    if (fs.existsSync(path.join(homeConfigDir, CONFIG_FILE))) {
      configDir = homeConfigDir
    }
  }

  let fileSettings: SunSettings = {}
  let configPath: string | null = null
  if (configDir) {
    configPath = path.join(configDir, CONFIG_FILE)
    fileSettings = mergeSettings(
      loadConfigFile(configPath, env),
      loadConfigFile(path.join(configDir, CONFIG_LOCAL_FILE), env)
    )
  }

  const envSettings = settingsFromEnv(env)
  const sources: LoadedConfig['sources'] = {}
  for (const key of Object.keys(fileSettings)) {
    Object.assign(sources, { [key]: 'settings' })
  }
  for (const key of Object.keys(envSettings)) {
    Object.assign(sources, { [key]: 'env' })
  }

  return {
    settings: mergeSettings(fileSettings, envSettings),
    configPath,
    sources
  }
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  const trimmed = filePath.trim()
  if (trimmed === '~') return homeDir
  if (trimmed.startsWith('~/')) return path.join(homeDir, trimmed.slice(2))
  return trimmed
}
