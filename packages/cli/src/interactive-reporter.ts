import process from 'node:process'
import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import {
  type Reporter,
  type RunEvent,
  type StageName,
  type StreamStatusEvent,
  exitCodeOf,
  formatDuration
} from '@nfsnow/core'

const stageLabels: Record<StageName, string> = {
  config: 'Reading Nextflow configuration',
  package: 'Packaging and uploading project',
  submit: 'Creating service',
  wait: 'Waiting for service to be ready',
  endpoint: 'Resolving streaming endpoint',
  stream: 'Streaming output',
  cleanup: 'Dropping service'
}

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Stages are shown on stderr; the run's own output goes to stdout as is.
 */
export class InteractiveReporter implements Reporter {
  private spinner?: Ora
  private streaming = false

  emit(event: RunEvent): void {
    switch (event.event) {
      case 'RUN_START': {
        const profile = event.profile ? chalk.gray(` (profile ${event.profile})`) : ''
        console.error(chalk.bold(`\n▶ Run: ${chalk.cyan(event.jobName)}${profile}\n`))
        break
      }

      case 'STAGE_STARTING': {
        if (event.stage === 'stream') {
          this.streaming = true
          console.error(chalk.gray(`  ${stageLabels.stream}\n`))
          break
        }

        this.spinner = ora({text: stageLabels[event.stage], prefixText: ' '}).start()
        break
      }

      case 'STAGE_FINISHED': {
        if (event.stage === 'stream') {
          this.streaming = false
          break
        }

        this.spinner?.stopAndPersist({
          symbol: chalk.green('✓'),
          text: chalk.green(`${stageLabels[event.stage]} (${formatDuration(event.durationMs)})`)
        })
        this.spinner = undefined
        break
      }

      case 'STREAM_OUTPUT': {
        process.stdout.write(event.data)
        break
      }

      case 'STREAM_STATUS': {
        this.handleStatus(event)
        break
      }

      case 'CLEANUP_FAILED': {
        this.spinner?.stopAndPersist({symbol: chalk.yellow('!'), text: chalk.yellow(event.message)})
        this.spinner = undefined
        break
      }

      case 'RUN_FAILED': {
        if (this.spinner && event.stage) {
          this.spinner.stopAndPersist({symbol: chalk.red('✗'), text: chalk.red(stageLabels[event.stage])})
          this.spinner = undefined
        }

        this.streaming = false
        break
      }

      case 'RUN_FINISHED': {
        break
      }
    }
  }

  private handleStatus(event: StreamStatusEvent): void {
    if (!this.streaming) {
      return
    }

    switch (event.phase) {
      case 'connected': {
        console.error(chalk.gray(`  Connected to ${String(event.fields.url)}\n`))
        break
      }

      case 'disconnected': {
        console.error(chalk.yellow(`\n  Disconnected: ${String(event.fields.reason)}`))
        break
      }

      case 'completed': {
        const exitCode = exitCodeOf(event.fields)
        console.error(chalk.gray(exitCode === undefined
          ? `\n  Process exited with an invalid exit code: ${JSON.stringify(event.fields.exit_code)}`
          : `\n  Process exited with code ${exitCode}`))
        break
      }

      default: {
        break
      }
    }
  }
}
