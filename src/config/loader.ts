/**
 * YAML pipeline file loader with type-safe parsing
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { ConfigurationError, errorMessage } from '../pipelines/errors'
import { validatePipelineConfigSafe, type PipelineConfig } from './schema'

/**
 * Parse and validate pipeline config from YAML text
 * @throws ConfigurationError if the YAML is malformed or validation fails
 */
export function parsePipelineConfig(content: string, source = '<inline>'): PipelineConfig {
  let raw: unknown
  try {
    raw = yaml.load(content)
  } catch (error) {
    throw new ConfigurationError(`Failed to parse YAML from ${source}: ${errorMessage(error)}`, { path: source })
  }

  const result = validatePipelineConfigSafe(raw)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid pipeline config in ${source}:\n  - ${result.errors.join('\n  - ')}`,
      { path: source, issues: result.errors }
    )
  }
  return result.data
}

/**
 * Load and validate pipeline config from a YAML file
 * @throws ConfigurationError if the file doesn't exist or validation fails
 */
export function loadPipelineConfig(filePath: string): PipelineConfig {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, { path: absolutePath })
  }

  return parsePipelineConfig(readFileSync(absolutePath, 'utf-8'), absolutePath)
}

/**
 * Load config with detailed error reporting
 * Returns success/failure with error messages
 */
export function loadPipelineConfigSafe(
  filePath: string
): { success: true; data: PipelineConfig } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Config file not found: ${absolutePath}`],
    }
  }

  let raw: unknown
  try {
    raw = yaml.load(readFileSync(absolutePath, 'utf-8'))
  } catch (error) {
    return {
      success: false,
      errors: [`Failed to parse YAML: ${errorMessage(error)}`],
    }
  }

  return validatePipelineConfigSafe(raw)
}
