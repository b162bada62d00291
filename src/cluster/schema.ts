/**
 * Hostfleet — Description Schema
 *
 * Shape checks for the cluster description. Semantics (addresses,
 * roles, peers) live in the resolver.
 */

import { z } from 'zod'
import { LOG_LEVELS } from './types.js'
import type { GlobalConfig, HostOverride } from './types.js'

export const DEFAULT_INSTALLER_URL =
  'https://github.com/nix-community/nixos-images/releases/download/nixos-23.11/nixos-kexec-installer-noninteractive-x86_64-linux.tar.gz'

export const DEFAULT_IMAGE_BUILDER =
  'nix build --no-link --print-out-paths --override-input descriptors path:{descriptors} {source}#hostfleet.{host}.system {source}#hostfleet.{host}.diskScript'

export const DEFAULT_IMAGE_COPIER = 'nix copy --no-check-sigs --to {store} {image}'

export const globalSchema = z.object({
  source_repository: z.string().min(1, 'source_repository is required'),
  access_tokens: z.string().min(1, 'access_tokens is required'),
  secret_directory: z.string().min(1).default('secrets'),
  image_builder: z.string().min(1).default(DEFAULT_IMAGE_BUILDER),
  image_copier: z.string().min(1).default(DEFAULT_IMAGE_COPIER),
  installer_url: z.string().url().default(DEFAULT_INSTALLER_URL),
}).strict()

const stringList = z.array(z.string().min(1))

export const hostOverrideSchema = z.object({
  role: z.string().optional(),
  ipv4_address: z.string().optional(),
  ipv4_gateway: z.string().optional(),
  ipv4_cidr: z.number().int().optional(),
  ipv6_address: z.string().optional(),
  ipv6_gateway: z.string().optional(),
  ipv6_cidr: z.number().int().optional(),
  mac_address: z.string().optional(),
  network_interface: z.string().min(1).optional(),
  ssh_hostname: z.string().min(1).optional(),
  install_ssh_user: z.string().min(1).optional(),
  public_ssh_keys: stringList.optional(),
  extra_modules: stringList.optional(),
  disks: stringList.optional(),
  chain_disks: stringList.optional(),
  monitoring: z.object({
    url: z.string().url().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
  }).strict().optional(),
  log_collector: z.string().min(1).optional(),
  log_level: z.enum(LOG_LEVELS).optional(),
  node_alias: z.string().optional(),
  advertised_addresses: stringList.optional(),
  api_access_list: stringList.optional(),
  rest_api_port: z.number().int().min(1).max(65535).optional(),
  upgrade_order: z.number().int().nonnegative().optional(),
}).strict()

/** Identity fields make no sense as fleet-wide defaults */
export const hostDefaultsSchema = hostOverrideSchema.omit({
  ipv4_address: true,
  ipv6_address: true,
  mac_address: true,
  ssh_hostname: true,
  node_alias: true,
  upgrade_order: true,
})

export type SchemaResult<T> = { ok: true; value: T } | { ok: false; issues: string[] }

function check<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): SchemaResult<T> {
  const result = schema.safeParse(input ?? {})
  if (result.success) return { ok: true, value: result.data }
  return {
    ok: false,
    issues: result.error.issues.map(issue => {
      const path = issue.path.join('.')
      if (issue.code === 'unrecognized_keys') return `${issue.keys.join(', ')} are not allowed fields`
      return path ? `${path}: ${issue.message}` : issue.message
    }),
  }
}

export function checkGlobal(input: unknown): SchemaResult<GlobalConfig> {
  return check(globalSchema, input)
}

export function checkHostOverride(input: unknown): SchemaResult<HostOverride> {
  return check(hostOverrideSchema, input)
}

export function checkHostDefaults(input: unknown): SchemaResult<HostOverride> {
  return check(hostDefaultsSchema, input)
}
