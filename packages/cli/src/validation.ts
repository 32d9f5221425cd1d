/**
 * Validation utilities for CLI options with helpful error messages.
 */

import { ConfigError, validateDomain } from "@surgekit/client"

export interface ValidationResult {
  valid: boolean
  error?: string
  warning?: string
}

/**
 * Validate an endpoint URL.
 * Must be a valid HTTP or HTTPS URL.
 */
export function validateUrl(url: string): ValidationResult {
  if (!url || !url.trim()) {
    return {
      valid: false,
      error: `URL cannot be empty`,
    }
  }

  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return {
      valid: false,
      error: `Invalid URL format: "${url}"\n  Expected format: https://host or http://host:port`,
    }
  }

  if (parsed.protocol !== `http:` && parsed.protocol !== `https:`) {
    return {
      valid: false,
      error: `Invalid URL protocol: "${parsed.protocol}"\n  Only http:// and https:// are supported`,
    }
  }

  if (!parsed.hostname) {
    return {
      valid: false,
      error: `URL must include a hostname: "${url}"`,
    }
  }

  return { valid: true }
}

/**
 * Validate an API token.
 * Valid for any non-empty value without whitespace; warns when the value
 * looks like an email address rather than a token.
 */
export function validateToken(token: string): ValidationResult {
  if (!token || !token.trim()) {
    return {
      valid: false,
      error: `Token cannot be empty`,
    }
  }

  if (/\s/.test(token)) {
    return {
      valid: false,
      error: `Token cannot contain whitespace\n  Pass the bare token, without an authorization scheme such as "Bearer"`,
    }
  }

  if (token.includes(`@`)) {
    return {
      valid: true,
      warning: `Warning: token looks like an email address.\n  Run "surgekit login <email> <password>" to get a token`,
    }
  }

  return { valid: true }
}

/**
 * Validate a publish domain.
 */
export function validateDomainArg(domain: string): ValidationResult {
  try {
    validateDomain(domain)
  } catch (error) {
    if (error instanceof ConfigError) {
      return { valid: false, error: error.message }
    }
    throw error
  }
  return { valid: true }
}

/**
 * Validate an account email address.
 */
export function validateEmail(email: string): ValidationResult {
  if (!email || !email.trim()) {
    return {
      valid: false,
      error: `Email cannot be empty`,
    }
  }

  if (!/^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(email)) {
    return {
      valid: false,
      error: `Invalid email address: "${email}"`,
    }
  }

  return { valid: true }
}
