import test from 'ava'
import {makeStep} from '../../__tests__/helpers.js'
import type {Container} from '../../types.js'
import {mergeStepWithTemplate, mergeStepsWithStepTemplate} from '../step-template.js'

test('template fills fields the step leaves unset', t => {
  const template: Container = {image: 'alpine', workingDir: '/src', command: ['sh'], args: ['-c']}
  const merged = mergeStepWithTemplate(template, {name: 'run'})
  t.is(merged.name, 'run')
  t.is(merged.image, 'alpine')
  t.is(merged.workingDir, '/src')
  t.deepEqual(merged.command, ['sh'])
  t.deepEqual(merged.args, ['-c'])
})

test('step fields win over the template', t => {
  const template: Container = {image: 'alpine', command: ['sh']}
  const merged = mergeStepWithTemplate(template, makeStep({command: ['make']}))
  t.is(merged.image, 'busybox')
  t.deepEqual(merged.command, ['make'])
})

test('an empty command list takes the template command', t => {
  const merged = mergeStepWithTemplate({command: ['sh']}, makeStep({command: []}))
  t.deepEqual(merged.command, ['sh'])
})

test('env merges by name with the step value winning', t => {
  const template: Container = {env: [{name: 'A', value: '1'}, {name: 'B', value: '2'}]}
  const merged = mergeStepWithTemplate(template, makeStep({env: [{name: 'B', value: '3'}]}))
  t.deepEqual(merged.env, [{name: 'B', value: '3'}, {name: 'A', value: '1'}])
})

test('volume mounts merge by mount path', t => {
  const template: Container = {volumeMounts: [{name: 'cache', mountPath: '/cache'}, {name: 'tmpl', mountPath: '/data'}]}
  const merged = mergeStepWithTemplate(template, makeStep({volumeMounts: [{name: 'own', mountPath: '/data'}]}))
  t.deepEqual(merged.volumeMounts, [{name: 'own', mountPath: '/data'}, {name: 'cache', mountPath: '/cache'}])
})

test('lists stay unset when neither side has them', t => {
  const merged = mergeStepWithTemplate({image: 'alpine'}, {})
  t.is(merged.env, undefined)
  t.is(merged.volumeMounts, undefined)
})

test('mergeStepsWithStepTemplate returns the steps untouched without a template', t => {
  const steps = [makeStep()]
  t.is(mergeStepsWithStepTemplate(undefined, steps), steps)
})

test('mergeStepsWithStepTemplate leaves its inputs unchanged', t => {
  const template: Container = {image: 'alpine', env: [{name: 'A', value: '1'}]}
  const steps = [{name: 'first'}, {name: 'second'}]
  const merged = mergeStepsWithStepTemplate(template, steps)
  t.is(merged.length, 2)
  t.is(merged[1]?.image, 'alpine')
  t.deepEqual(steps, [{name: 'first'}, {name: 'second'}])
  t.deepEqual(template.env, [{name: 'A', value: '1'}])
})
