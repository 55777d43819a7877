import type { TaskValue } from '../value/model.js'

export type ActionEffect = {
  readonly params: { readonly [param: string]: TaskValue }
  /** Module used for this action instead of the type's module (`file` + `:delete` → `file: state=absent`). */
  readonly module?: string
  readonly nameParam?: string
}

export type ResourceMapping = {
  readonly module: string
  /** Parameter that receives the declaration name; absent when the name is only a label (`bash`). */
  readonly nameParam?: string
  readonly defaultAction: string
  readonly actions: { readonly [action: string]: ActionEffect }
  /** Property → parameter. Properties not listed are dropped with a warning. */
  readonly properties: { readonly [property: string]: string }
}

export type ResourceTableEntries = { readonly [type: string]: ResourceMapping }

const same = (...names: ReadonlyArray<string>): { readonly [property: string]: string } =>
  Object.fromEntries(names.map((n) => [n, n]))

const on = (params: { readonly [param: string]: TaskValue }): ActionEffect => ({ params })

const absentFile: ActionEffect = { params: { state: 'absent' }, module: 'ansible.builtin.file', nameParam: 'path' }

const packageActions = {
  install: on({ state: 'present' }),
  upgrade: on({ state: 'latest' }),
  remove: on({ state: 'absent' }),
  purge: on({ state: 'absent' }),
  nothing: on({}),
}

const serviceActions = {
  start: on({ state: 'started' }),
  stop: on({ state: 'stopped' }),
  restart: on({ state: 'restarted' }),
  reload: on({ state: 'reloaded' }),
  enable: on({ enabled: true }),
  disable: on({ enabled: false }),
  nothing: on({}),
}

const fileProperties = same('owner', 'group', 'mode', 'backup')

export const DEFAULT_RESOURCE_TABLE: ResourceTableEntries = {
  package: {
    module: 'ansible.builtin.package',
    nameParam: 'name',
    defaultAction: 'install',
    actions: packageActions,
    properties: { package_name: 'name' },
  },
  apt_package: {
    module: 'ansible.builtin.apt',
    nameParam: 'name',
    defaultAction: 'install',
    actions: { ...packageActions, purge: on({ state: 'absent', purge: true }) },
    properties: { package_name: 'name', default_release: 'default_release', options: 'dpkg_options' },
  },
  yum_package: {
    module: 'ansible.builtin.dnf',
    nameParam: 'name',
    defaultAction: 'install',
    actions: packageActions,
    properties: { package_name: 'name' },
  },
  dnf_package: {
    module: 'ansible.builtin.dnf',
    nameParam: 'name',
    defaultAction: 'install',
    actions: packageActions,
    properties: { package_name: 'name' },
  },
  service: {
    module: 'ansible.builtin.service',
    nameParam: 'name',
    defaultAction: 'nothing',
    actions: serviceActions,
    properties: { service_name: 'name', pattern: 'pattern' },
  },
  systemd_unit: {
    module: 'ansible.builtin.systemd_service',
    nameParam: 'name',
    defaultAction: 'nothing',
    actions: {
      ...serviceActions,
      mask: on({ masked: true }),
      unmask: on({ masked: false }),
      daemon_reload: on({ daemon_reload: true }),
    },
    properties: { unit_name: 'name' },
  },
  file: {
    module: 'ansible.builtin.copy',
    nameParam: 'dest',
    defaultAction: 'create',
    actions: {
      create: on({}),
      create_if_missing: on({ force: false }),
      touch: { params: { state: 'touch' }, module: 'ansible.builtin.file', nameParam: 'path' },
      delete: absentFile,
      nothing: on({}),
    },
    properties: { ...fileProperties, content: 'content', path: 'dest' },
  },
  template: {
    module: 'ansible.builtin.template',
    nameParam: 'dest',
    defaultAction: 'create',
    actions: { create: on({}), create_if_missing: on({ force: false }), delete: absentFile, nothing: on({}) },
    properties: { ...fileProperties, source: 'src', path: 'dest' },
  },
  cookbook_file: {
    module: 'ansible.builtin.copy',
    nameParam: 'dest',
    defaultAction: 'create',
    actions: { create: on({}), create_if_missing: on({ force: false }), delete: absentFile, nothing: on({}) },
    properties: { ...fileProperties, source: 'src', path: 'dest' },
  },
  remote_file: {
    module: 'ansible.builtin.get_url',
    nameParam: 'dest',
    defaultAction: 'create',
    actions: { create: on({}), create_if_missing: on({ force: false }), delete: absentFile, nothing: on({}) },
    properties: { ...fileProperties, source: 'url', path: 'dest', checksum: 'checksum', headers: 'headers' },
  },
  directory: {
    module: 'ansible.builtin.file',
    nameParam: 'path',
    defaultAction: 'create',
    actions: { create: on({ state: 'directory' }), delete: on({ state: 'absent' }), nothing: on({}) },
    properties: { owner: 'owner', group: 'group', mode: 'mode', recursive: 'recurse', path: 'path' },
  },
  link: {
    module: 'ansible.builtin.file',
    nameParam: 'path',
    defaultAction: 'create',
    actions: { create: on({ state: 'link' }), delete: on({ state: 'absent' }), nothing: on({}) },
    properties: { to: 'src', target_file: 'path', owner: 'owner', group: 'group', mode: 'mode' },
  },
  execute: {
    module: 'ansible.builtin.command',
    nameParam: 'cmd',
    defaultAction: 'run',
    actions: { run: on({}), nothing: on({}) },
    properties: { command: 'cmd', cwd: 'chdir', creates: 'creates' },
  },
  bash: {
    module: 'ansible.builtin.shell',
    defaultAction: 'run',
    actions: { run: on({ executable: '/bin/bash' }), nothing: on({}) },
    properties: { code: 'cmd', cwd: 'chdir', creates: 'creates' },
  },
  script: {
    module: 'ansible.builtin.shell',
    defaultAction: 'run',
    actions: { run: on({}), nothing: on({}) },
    properties: { code: 'cmd', interpreter: 'executable', cwd: 'chdir', creates: 'creates' },
  },
  user: {
    module: 'ansible.builtin.user',
    nameParam: 'name',
    defaultAction: 'create',
    actions: {
      create: on({ state: 'present' }),
      manage: on({ state: 'present' }),
      modify: on({ state: 'present' }),
      remove: on({ state: 'absent' }),
      lock: on({ password_lock: true }),
      unlock: on({ password_lock: false }),
      nothing: on({}),
    },
    properties: {
      ...same('uid', 'home', 'shell', 'comment', 'password', 'system'),
      username: 'name',
      gid: 'group',
      manage_home: 'create_home',
    },
  },
  group: {
    module: 'ansible.builtin.group',
    nameParam: 'name',
    defaultAction: 'create',
    actions: {
      create: on({ state: 'present' }),
      manage: on({ state: 'present' }),
      modify: on({ state: 'present' }),
      remove: on({ state: 'absent' }),
      nothing: on({}),
    },
    properties: { group_name: 'name', gid: 'gid', system: 'system' },
  },
  cron: {
    module: 'ansible.builtin.cron',
    nameParam: 'name',
    defaultAction: 'create',
    actions: { create: on({ state: 'present' }), delete: on({ state: 'absent' }), nothing: on({}) },
    properties: { ...same('minute', 'hour', 'day', 'month', 'weekday', 'user'), command: 'job' },
  },
  git: {
    module: 'ansible.builtin.git',
    nameParam: 'dest',
    defaultAction: 'sync',
    actions: { sync: on({ update: true }), checkout: on({ update: false }), nothing: on({}) },
    properties: { repository: 'repo', revision: 'version', destination: 'dest', depth: 'depth' },
  },
  mount: {
    module: 'ansible.posix.mount',
    nameParam: 'path',
    defaultAction: 'mount',
    actions: {
      mount: on({ state: 'mounted' }),
      umount: on({ state: 'unmounted' }),
      unmount: on({ state: 'unmounted' }),
      remount: on({ state: 'remounted' }),
      enable: on({ state: 'present' }),
      disable: on({ state: 'absent' }),
      nothing: on({}),
    },
    properties: { device: 'src', fstype: 'fstype', options: 'opts', mount_point: 'path', dump: 'dump', pass: 'passno' },
  },
  log: {
    module: 'ansible.builtin.debug',
    nameParam: 'msg',
    defaultAction: 'write',
    actions: { write: on({}), nothing: on({}) },
    properties: { message: 'msg' },
  },
  include_recipe: {
    module: 'ansible.builtin.include_role',
    nameParam: 'name',
    defaultAction: 'include',
    actions: { include: on({}) },
    properties: {},
  },
}
