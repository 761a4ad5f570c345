export const USAGE = `Usage: consul-scaleset-bootstrap (--server | --client) [OPTIONS]

Resolves this instance's scale set and writes the Consul agent configuration
and its supervisord program descriptor.

Required:
  --server                   Run the agent in server mode
  --client                   Run the agent in client mode
  --tenant-id <id>           Azure tenant of the service principal       [AZURE_TENANT_ID]
  --client-id <id>           Application id of the service principal     [AZURE_CLIENT_ID]
  --secret <secret>          Client secret of the service principal      [AZURE_CLIENT_SECRET]
  --scale-set-name <name>    Scale set to join; required with --client   [CONSUL_SCALE_SET_NAME]

Optional:
  --raft-protocol <n>        Raft protocol version (default 3)           [CONSUL_RAFT_PROTOCOL]
  --skip-consul-config       Do not generate the agent configuration
  --consul-dir <dir>         Consul install root (default /opt/consul)   [CONSUL_DIR]
  --bin-dir <dir>            Default <consul-dir>/bin
  --config-dir <dir>         Default <consul-dir>/config
  --data-dir <dir>           Default <consul-dir>/data
  --log-dir <dir>            Default <consul-dir>/log
  --user <name>              Account the agent runs as (default consul)  [CONSUL_USER]
  --supervisor-config-path <path>
                             Default /etc/supervisor/conf.d/run-consul.conf
  --log-level <level>        debug, info, warn, error or silent          [LOG_LEVEL]
  --help                     Show this message
`;
