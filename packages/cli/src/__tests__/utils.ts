import test from 'ava'
import {formatDuration, ReadinessTimeoutError, StreamConnectionError, UploadError} from '@nfsnow/core'
import {describeError, describeOutcome} from '../utils.js'

test('describeOutcome: success exits with 0', t => {
  t.deepEqual(describeOutcome({status: 'exited', exitCode: 0}), {
    exitCode: 0,
    message: 'Nextflow run completed successfully'
  })
})

test('describeOutcome: failure keeps the Nextflow exit code', t => {
  t.deepEqual(describeOutcome({status: 'exited', exitCode: 3}), {
    exitCode: 3,
    message: 'Nextflow run failed with exit code 3'
  })
})

test('describeOutcome: incomplete runs exit with 1', t => {
  for (const reason of ['closed', 'cancelled'] as const) {
    t.deepEqual(describeOutcome({status: 'incomplete', reason}), {
      exitCode: 1,
      message: 'Nextflow run was interrupted or failed to complete'
    })
  }
})

test('describeOutcome: a completion without a valid exit code exits with 1', t => {
  t.deepEqual(describeOutcome({status: 'incomplete', reason: 'unknown-exit-code'}), {
    exitCode: 1,
    message: 'Nextflow run completed without a valid exit code'
  })
})

test('describeError adds a retry hint to transient failures only', t => {
  t.deepEqual(describeError(new ReadinessTimeoutError('NXF_MAIN_abcd1234', 30)), {
    message: 'Service NXF_MAIN_abcd1234 was not ready within 30s',
    hint: 'This failure may be temporary, try running the command again.'
  })
  t.is(describeError(new StreamConnectionError('Connection failed')).hint, 'This failure may be temporary, try running the command again.')
  t.deepEqual(describeError(new UploadError('nf_work/abcd1234')), {message: 'Failed to upload project to nf_work/abcd1234'})
})

test('formatDuration picks a readable unit', t => {
  t.is(formatDuration(850), '850ms')
  t.is(formatDuration(12_340), '12.3s')
  t.is(formatDuration(125_000), '2m 5s')
})
