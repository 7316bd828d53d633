import { program } from 'commander'
import pino from 'pino'
import { isPoolError } from '../lib/errors'
import { registry as metricsRegistry } from '../lib/metrics'
import { PoolRegistry } from '../lib/pool'
import { loadPresetsFromDir } from '../lib/presets'

const silentLogger = pino({ level: 'silent' })

function fail(e: unknown, fallback: string): never {
  if (isPoolError(e)) {
    console.error(`[${e.code}] ${e.message}`)
  } else {
    console.error(e instanceof Error ? e.message : fallback)
  }
  process.exit(1)
}

program.name('reservoir').description('Inspect Reservoir pool presets').version('0.1.0')

program
  .command('validate <dir>')
  .description('Validate preset files and list the presets they define')
  .action((dir: string) => {
    try {
      const groups = loadPresetsFromDir(dir)
      for (const group of groups) {
        console.log(`${group.name}:`)
        for (const preset of group.presets) {
          const template = preset.template ? preset.template.tag : '(none, skipped)'
          console.log(
            `  ${preset.tag ?? '-'}  template=${template}  initial=${preset.initialCount}  expandable=${preset.expandable}`,
          )
        }
      }
      console.log(`${groups.length} group(s) valid`)
    } catch (e) {
      fail(e, 'Validation failed')
    }
  })

program
  .command('prewarm <dir>')
  .description('Prewarm a registry from preset files and print its stats')
  .action((dir: string) => {
    try {
      const registry = new PoolRegistry({ logger: silentLogger })
      registry.prewarm(loadPresetsFromDir(dir))
      console.log(JSON.stringify(registry.getStats(), null, 2))
    } catch (e) {
      fail(e, 'Prewarm failed')
    }
  })

program
  .command('metrics <dir>')
  .description('Prewarm a registry from preset files and print Prometheus metrics')
  .action(async (dir: string) => {
    try {
      const registry = new PoolRegistry({ logger: silentLogger })
      registry.prewarm(loadPresetsFromDir(dir))
      console.log(await metricsRegistry.metrics())
    } catch (e) {
      fail(e, 'Metrics failed')
    }
  })

program.parseAsync().catch((e: unknown) => fail(e, 'Command failed'))
