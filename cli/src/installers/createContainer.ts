import type { InstallerContext } from './types.js'
import { ContainerCreateFailedError } from '../errors.js'

const LINUXBREW_VOLUME = '/home/linuxbrew/.linuxbrew:/home/linuxbrew/.linuxbrew'

// Appends host.docker.internal / host.containers.internal once, pointing at
// the container's default gateway.
const HOST_ALIASES_SCRIPT = [
  'HOST_IP=$(ip route | awk \'/default/ {print $3; exit}\')',
  '[ -n "$HOST_IP" ] || HOST_IP=172.17.0.1',
  'for h in host.docker.internal host.containers.internal; do',
  '  grep -q "$h" /etc/hosts || echo "$HOST_IP $h" | sudo tee -a /etc/hosts >/dev/null',
  'done'
].join('\n')

export type CreateResult = 'created' | 'reused'

export async function createContainer(ctx: InstallerContext): Promise<CreateResult> {
  const { run, logger, toolchain } = ctx
  const name = run.containerName
  logger.info('Creating distrobox container...')
  ctx.emit({ phase: 'create', outcome: 'started' })

  if (await toolchain.exists(name)) {
    let recreate: boolean
    if (run.force) {
      logger.warn('Container exists, removing due to --force flag')
      recreate = true
    } else {
      logger.warn(`Container '${name}' already exists`)
      recreate = await ctx.confirmRecreate()
    }

    if (!recreate) {
      // Declining is a success: the existing (possibly stale) container is reused.
      logger.info('Keeping existing container')
      ctx.emit({ phase: 'create', outcome: 'skipped', reason: 'existing container kept' })
      return 'reused'
    }

    logger.info('Removing existing container')
    const removed = await toolchain.remove(name)
    if (removed.exitCode !== 0) {
      const detail = removed.stderr.trim() || `distrobox rm exited with ${removed.exitCode}`
      ctx.emit({ phase: 'create', outcome: 'failed', reason: detail })
      throw new ContainerCreateFailedError(name, detail)
    }
  }

  const volumes = [LINUXBREW_VOLUME]
  if (run.mountContainers) {
    const docker = await toolchain.dockerSocket()
    if (docker) {
      logger.info('Mounting Docker socket for host Docker access')
      volumes.push(`${docker}:${docker}`)
    }
    const podman = await toolchain.podmanSocket()
    if (podman) {
      logger.info(`Mounting Podman socket for host Podman access: ${podman.source} -> ${podman.target}`)
      volumes.push(`${podman.source}:${podman.target}`)
    } else {
      logger.info('Podman socket not found')
    }
  } else {
    logger.info('Skipping Docker/Podman socket mounts (use --mount-containers to enable)')
  }

  logger.info('Creating new distrobox container')
  const created = await toolchain.create({
    name,
    image: run.imageName,
    volumes,
    additionalFlags: [
      `--hostname ${name}`,
      '--userns=keep-id',
      '--security-opt=label=disable',
      '--device=/dev/dri'
    ]
  })

  if (created.exitCode !== 0) {
    const detail = created.stderr.trim() || `distrobox create exited with ${created.exitCode}`
    ctx.emit({ phase: 'create', outcome: 'failed', reason: detail })
    logger.err('Failed to create distrobox container')
    throw new ContainerCreateFailedError(name, detail)
  }
  logger.ok('Distrobox container created successfully')

  if (run.mountContainers) {
    logger.info('Configuring host access hostnames...')
    const res = await toolchain.enter(name, ['bash', '-c', HOST_ALIASES_SCRIPT])
    if (res.exitCode !== 0) logger.info('Hostname configuration skipped (optional feature)')
  }

  ctx.emit({ phase: 'create', outcome: 'succeeded' })
  return 'created'
}
