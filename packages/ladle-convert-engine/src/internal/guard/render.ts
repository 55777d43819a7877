import type { ValueExpr } from '../value/model.js'
import { renderExpression } from '../value/render.js'
import type { BoolExpr, TestKind } from './model.js'

const PLATFORM_FACT = "ansible_facts['distribution'] | lower"
const PLATFORM_FAMILY_FACT = "ansible_facts['os_family'] | lower"

/** Automatic node attributes that have a direct fact counterpart. */
const FACTS: { readonly [attribute: string]: string } = {
  platform: PLATFORM_FACT,
  platform_family: PLATFORM_FAMILY_FACT,
  platform_version: "ansible_facts['distribution_version']",
  hostname: "ansible_facts['hostname']",
  fqdn: "ansible_facts['fqdn']",
  ipaddress: "ansible_facts['default_ipv4']['address']",
}

const operand = (value: ValueExpr): string => {
  if (value.kind === 'AttributePath' && value.scope !== 'new_resource' && value.keys.length === 1) {
    const fact = FACTS[value.keys[0] ?? '']
    if (fact !== undefined) return fact
  }
  return renderExpression(value)
}

const renderTest = (test: TestKind, subject: ValueExpr): string => {
  const s = operand(subject)
  switch (test) {
    case 'path_exists':
      return `${s} is exists`
    case 'file_exists':
      return `${s} is file`
    case 'directory_exists':
      return `${s} is directory`
    case 'command_available':
      return `lookup('ansible.builtin.pipe', 'command -v ' ~ ${s} ~ ' || true') | length > 0`
    case 'service_active':
      return `ansible_facts.services[${s} ~ '.service'].state | default('') == 'running'`
    case 'service_enabled':
      return `ansible_facts.services[${s} ~ '.service'].status | default('') == 'enabled'`
    case 'process_running':
      return `lookup('ansible.builtin.pipe', 'pgrep -f ' ~ ${s} ~ ' || true') | length > 0`
    case 'package_installed':
      return `${s} in ansible_facts.packages`
    case 'user_exists':
      return `${s} in getent_passwd`
    case 'group_exists':
      return `${s} in getent_group`
    case 'platform':
      return `${PLATFORM_FACT} in ${subject.kind === 'List' ? s : `[${s}]`}`
    case 'platform_family':
      return `${PLATFORM_FAMILY_FACT} in ${subject.kind === 'List' ? s : `[${s}]`}`
  }
}

const group = (expr: BoolExpr): string => {
  const text = renderWhen(expr)
  return expr.kind === 'And' || expr.kind === 'Or' || expr.kind === 'Test' || expr.kind === 'Compare' ? `(${text})` : text
}

/** Ansible `when:` expression for a condition. */
export const renderWhen = (expr: BoolExpr): string => {
  switch (expr.kind) {
    case 'Bool':
      return expr.value ? 'true' : 'false'
    case 'Test':
      return renderTest(expr.test, expr.subject)
    case 'Compare':
      if (expr.right.kind === 'Literal' && expr.right.value === null && (expr.op === '==' || expr.op === '!=')) {
        return `${operand(expr.left)} is ${expr.op === '==' ? 'none' : 'not none'}`
      }
      return `${operand(expr.left)} ${expr.op} ${operand(expr.right)}`
    case 'Truthy':
      return `${operand(expr.value)} | bool`
    case 'Not':
      return `not ${group(expr.expr)}`
    case 'And':
      return expr.exprs.map(group).join(' and ')
    case 'Or':
      return expr.exprs.map(group).join(' or ')
    case 'Opaque':
      return expr.raw
  }
}
