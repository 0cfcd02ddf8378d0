/**
 * Agent Configuration Tests
 */

import { describe, expect, it } from 'vitest';
import { DEFAULT_RETRY_CONFIG } from '@clusterlink/shared-types';
import { DEFAULT_AGENT_CONFIG, agentConfigFromConnStr, createAgentConfig, redactConfig } from '../config.js';
import { ConfigurationError } from '../errors/index.js';

function optionOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.option;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

// =============================================================================
// createAgentConfig
// =============================================================================

describe('createAgentConfig', () => {
  it('should fill in defaults and freeze the result', () => {
    const config = createAgentConfig({ memdAddrs: ['db1:11210'] });

    expect(config).toEqual({ ...DEFAULT_AGENT_CONFIG, memdAddrs: ['db1:11210'] });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.memdAddrs)).toBe(true);
    expect(config.retry).toEqual(DEFAULT_RETRY_CONFIG);
  });

  it('should merge partial nested settings', () => {
    const config = createAgentConfig({
      httpAddrs: ['db1:8091'],
      retry: { maxDelayMs: 250 },
      orphanLogging: { enabled: true },
    });
    expect(config.retry.maxDelayMs).toBe(250);
    expect(config.orphanLogging).toEqual({ enabled: true, intervalMs: 10000, sampleSize: 10 });
  });

  it('should require a seed address', () => {
    expect(() => createAgentConfig()).toThrow('at least one seed address is required');
  });

  it('should name the first invalid option', () => {
    expect(() => createAgentConfig({ memdAddrs: ['db1'] })).toThrow(
      'invalid configuration for memdAddrs.0: expected host:port'
    );
    expect(optionOf(() => createAgentConfig({ memdAddrs: ['db1:11210'], kvPoolSize: 0 }))).toBe('kvPoolSize');
    expect(() => createAgentConfig({ memdAddrs: ['db1:11210'], retry: { backoffFactor: 0.5 } })).toThrow(
      'invalid configuration for retry: backoffFactor must be at least 1'
    );
  });
});

// =============================================================================
// Connection strings
// =============================================================================

describe('agentConfigFromConnStr', () => {
  it('should seed both protocols for hosts without a port', () => {
    const config = agentConfigFromConnStr(
      'cluster://10.0.0.1,10.0.0.2:11210/travel?kv_pool_size=2&config_poll_interval=1000'
    );

    expect(config.memdAddrs).toEqual(['10.0.0.1:11210', '10.0.0.2:11210']);
    expect(config.httpAddrs).toEqual(['10.0.0.1:8091']);
    expect(config.bucketName).toBe('travel');
    expect(config.kvPoolSize).toBe(2);
    expect(config.configPollPeriodMs).toBe(1000);
    expect(config.useTls).toBe(false);
    expect(config.bootstrapOn).toBe('both');
  });

  it('should use the TLS ports for clusters://', () => {
    const config = agentConfigFromConnStr('clusters://db1.example.test;db2.example.test:18091');

    expect(config.useTls).toBe(true);
    expect(config.tlsSkipVerify).toBe(true);
    expect(config.memdAddrs).toEqual(['db1.example.test:11207', 'db2.example.test:11207']);
    expect(config.httpAddrs).toEqual(['db1.example.test:18091', 'db2.example.test:18091']);
  });

  it('should bootstrap over HTTP only for http://', () => {
    const config = agentConfigFromConnStr('http://10.0.0.5');
    expect(config.memdAddrs).toEqual([]);
    expect(config.httpAddrs).toEqual(['10.0.0.5:8091']);
    expect(config.bootstrapOn).toBe('http');
  });

  it('should honor bootstrap_on', () => {
    const config = agentConfigFromConnStr('cluster://db1,db2?bootstrap_on=cccp');
    expect(config.httpAddrs).toEqual([]);
    expect(config.memdAddrs).toEqual(['db1:11210', 'db2:11210']);
    expect(config.bootstrapOn).toBe('cccp');

    expect(() => agentConfigFromConnStr('cluster://db1:11210?bootstrap_on=http')).toThrow(
      'bootstrap_on=http but no HTTP hosts in connection string'
    );
    expect(() => agentConfigFromConnStr('cluster://db1?bootstrap_on=sometimes')).toThrow(
      'bootstrap_on must be one of http, cccp or both'
    );
  });

  it('should accept bracketed and bare IPv6 hosts', () => {
    expect(agentConfigFromConnStr('cluster://[fe80::1]:11210').memdAddrs).toEqual(['[fe80::1]:11210']);
    expect(agentConfigFromConnStr('cluster://[fe80::1]').httpAddrs).toEqual(['[fe80::1]:8091']);
  });

  it('should parse network, orphan logging and repeated options', () => {
    const config = agentConfigFromConnStr(
      'cluster://db1?network=external&orphaned_response_logging=true' +
        '&orphaned_response_logging_interval=500&kv_pool_size=1&kv_pool_size=3&unknown_option=x'
    );
    expect(config.networkType).toBe('external');
    expect(config.orphanLogging).toEqual({ enabled: true, intervalMs: 500, sampleSize: 10 });
    expect(config.kvPoolSize).toBe(3);
    expect(agentConfigFromConnStr('cluster://db1?network=default').networkType).toBe('');
  });

  it('should parse the connect timeouts', () => {
    const config = agentConfigFromConnStr('cluster://db1?connect_timeout=2500&kv_connect_timeout=800');
    expect(config.connectTimeoutMs).toBe(2500);
    expect(config.kvConnectTimeoutMs).toBe(800);
  });

  it('should reject malformed strings and option values', () => {
    expect(() => agentConfigFromConnStr('ftp://db1')).toThrow('unsupported connection string: ftp://db1');
    expect(() => agentConfigFromConnStr('cluster://db1:port')).toThrow('invalid host in connection string: db1:port');
    expect(() => agentConfigFromConnStr('cluster://db1?kv_pool_size=two')).toThrow(
      'kv_pool_size option must be a number'
    );
    expect(optionOf(() => agentConfigFromConnStr('cluster://db1?orphaned_response_logging=maybe'))).toBe(
      'orphaned_response_logging'
    );
  });

  it('should apply overrides last', () => {
    const config = agentConfigFromConnStr('cluster://db1?kv_pool_size=2', {
      kvPoolSize: 4,
      orphanLogging: { sampleSize: 3 },
    });
    expect(config.kvPoolSize).toBe(4);
    expect(config.orphanLogging.sampleSize).toBe(3);
  });
});

// =============================================================================
// Redaction
// =============================================================================

describe('redactConfig', () => {
  it('should wrap addresses and the bucket name', () => {
    const redacted = redactConfig(createAgentConfig({ memdAddrs: ['db1:11210'], bucketName: 'travel' }));
    expect(redacted.memdAddrs).toEqual(['<redacted>db1:11210</redacted>']);
    expect(redacted.httpAddrs).toEqual([]);
    expect(redacted.bucketName).toBe('<redacted>travel</redacted>');
    expect(redacted.kvPoolSize).toBe(1);
  });
});
