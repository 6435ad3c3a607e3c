/**
 * Shared manifest fixtures for kernel tests.
 */

/**
 * Files, services, an exec with an interpolated title and a user-defined
 * type, wired with mixed singular and array chain operands.
 *
 * NodeIds: 0 /tmp/one, 1 /tmp/two, 2 /tmp/two/three, 3 /tmp/two/four,
 * 4 nginx, 5 ssh, 6 exec, 7 foo::bar baz.
 */
export const SAMPLE_MANIFEST = `# Sample site
file { '/tmp/one':
  ensure => present,
}

file { '/tmp/two':
  ensure => directory,
}

file { ['/tmp/two/three', '/tmp/two/four']:
  ensure => present,
  mode   => '0644',
}

service { 'nginx': ensure => running }
service { 'ssh': ensure => running, }

exec { "/root/\${scripts}/yo.sh": }

foo::bar { 'baz': }

File['/tmp/one'] ~> Service['ssh']
File['/tmp/two'] -> [File['/tmp/two/three'], File['/tmp/two/four']] ~> Service['nginx']
Exec["/root/$scripts/yo.sh"] -> Foo::Bar['baz']
`;

/**
 * Relationships written only as metaparameters.
 *
 * NodeIds: 0 sshd_config, 1 ssh, 2 setup.
 */
export const METAPARAMETER_MANIFEST = `file { '/etc/ssh/sshd_config':
  ensure => present,
  notify => Service['ssh'],
}
service { 'ssh':
  ensure  => running,
  require => [File['/etc/ssh/sshd_config'], Exec['setup']],
}
exec { 'setup': before => File['/etc/ssh/sshd_config'] }
`;
