import { createGatewayUserData } from '../lib/gateway-user-data';

describe('createGatewayUserData', () => {
  const lines = createGatewayUserData({
    projectName: 'agent-gateway',
    region: 'eu-west-1',
    secretArn: 'arn:aws:secretsmanager:eu-west-1:123456789012:secret:test-secret',
    logGroupName: '/agent-gateway/dev/gateway',
    gatewayImage: 'ghcr.io/example/gateway:1.0.0',
    gatewayPort: 18789,
  })
    .render()
    .split('\n');

  test('fails fast on any error', () => {
    expect(lines[0]).toBe('#!/bin/bash');
    expect(lines[1]).toBe('set -euo pipefail');
  });

  test('installs Docker and the arm64 AWS CLI', () => {
    expect(lines).toContain('apt-get install -y ca-certificates curl jq unzip docker.io');
    expect(lines).toContain(
      'curl -fsSL "https://awscli.amazonaws.com/awscli-exe-linux-aarch64.zip" -o /tmp/awscliv2.zip'
    );
  });

  test('ships container logs to the gateway log group', () => {
    expect(lines).toContain('  "log-driver": "awslogs",');
    expect(lines).toContain('    "awslogs-region": "eu-west-1",');
    expect(lines).toContain('    "awslogs-group": "/agent-gateway/dev/gateway",');
    expect(lines).toContain('  "icc": false,');
  });

  test('renders the env file from the secret', () => {
    expect(lines).toContain(
      'aws secretsmanager get-secret-value --secret-id "arn:aws:secretsmanager:eu-west-1:123456789012:secret:test-secret" --region "eu-west-1" \\'
    );
    expect(lines).toContain(
      `  | jq -r 'to_entries[] | "\\(.key)=\\(.value)"' > /opt/agent-gateway/gateway.env.tmp`
    );
  });

  test('runs the gateway image under systemd with the Docker socket', () => {
    expect(lines).toContain('ExecStartPre=/usr/local/bin/agent-gateway-render-env');
    expect(lines).toContain('ExecStartPre=/usr/bin/docker pull ghcr.io/example/gateway:1.0.0');
    expect(lines).toContain('  -p 18789:18789 \\');
    expect(lines).toContain('  -v /var/run/docker.sock:/var/run/docker.sock \\');
    expect(lines).toContain('  ghcr.io/example/gateway:1.0.0');
    expect(lines).toContain('systemctl enable --now agent-gateway.service');
    expect(lines[lines.length - 1]).toBe('echo "=== Bootstrap complete ==="');
  });
});
