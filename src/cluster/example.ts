/**
 * Hostfleet — Example Description
 *
 * Printed by `hostfleet generate-example`. The copy checked in at
 * example/cluster.toml must stay identical to this text.
 */

const EXAMPLE = `# Cluster description for hostfleet.
# Host order matters: it is the install order and the default upgrade order.

[global]
# Deployment repository the image compiler builds from
source_repository = "github:example/fleet-deployment"
# Credentials for the deployment repository, written to every host
access_tokens = "github.com=replace-with-a-read-only-token"
# Secrets tree, relative to this file
secret_directory = "secrets"
# Image compiler command; prints the system image, then optionally the disk script
# ({host}, {source}, {descriptor} and {descriptors} are substituted)
# image_builder = "nix build --no-link --print-out-paths {source}#hostfleet.{host}.system"
# Copies a compiled image to a host ({store} and {image} are substituted)
# image_copier = "nix copy --no-check-sigs --to {store} {image}"

# Applied to every host unless the host sets the field itself.
# public_ssh_keys adds up: host keys first, then these.
[host_defaults]
ipv4_gateway = "192.0.2.1"
ipv4_cidr = 24
ipv6_gateway = "2001:db8::1"
ipv6_cidr = 48
public_ssh_keys = ["ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAIExampleKey operator@example"]
disks = ["/dev/nvme0n1", "/dev/nvme1n1"]
log_level = "info"

[hosts.db-00]
role = "database"
ipv4_address = "192.0.2.10"
ipv6_address = "2001:db8::10"

[hosts.db-01]
role = "database"
ipv4_address = "192.0.2.11"
ipv6_address = "2001:db8::11"

[hosts.app-00]
role = "application"
ipv4_address = "192.0.2.20"
ipv6_address = "2001:db8::20"
mac_address = "00:00:5e:00:53:20"
node_alias = "example-router"
chain_disks = ["/dev/sda"]
api_access_list = ["192.0.2.100"]
`

export function renderExample(): string {
  return EXAMPLE
}
