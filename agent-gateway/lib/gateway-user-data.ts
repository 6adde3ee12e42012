import * as ec2 from 'aws-cdk-lib/aws-ec2';

export interface GatewayUserDataProps {
  readonly projectName: string;
  readonly region: string;
  readonly secretArn: string;
  readonly logGroupName: string;
  readonly gatewayImage: string;
  readonly gatewayPort: number;
}

/**
 * Bootstrap script for the gateway host (Ubuntu 24.04 arm64).
 *
 * The gateway runs as a Docker container under systemd. It gets the Docker
 * socket so it can start agent sandbox containers next to itself, and an
 * env file rendered from the Secrets Manager secret on every start.
 */
export function createGatewayUserData(props: GatewayUserDataProps): ec2.UserData {
  const { projectName, region, secretArn, logGroupName, gatewayImage, gatewayPort } = props;
  const appDir = `/opt/${projectName}`;
  const envFile = `${appDir}/gateway.env`;
  const renderEnvScript = `/usr/local/bin/${projectName}-render-env`;

  const userData = ec2.UserData.forLinux();
  userData.addCommands(
    'set -euo pipefail',
    'exec > >(tee /var/log/user-data.log) 2>&1',
    '',
    'echo "=== Bootstrapping agent gateway host ==="',
    '',
    '# Packages',
    'export DEBIAN_FRONTEND=noninteractive',
    'apt-get update -y',
    'apt-get install -y ca-certificates curl jq unzip docker.io',
    '',
    '# AWS CLI v2',
    'curl -fsSL "https://awscli.amazonaws.com/awscli-exe-linux-aarch64.zip" -o /tmp/awscliv2.zip',
    'unzip -q /tmp/awscliv2.zip -d /tmp',
    '/tmp/aws/install --update',
    'rm -rf /tmp/aws /tmp/awscliv2.zip',
    '',
    '# Docker daemon: container logs to CloudWatch, no inter-container traffic',
    'mkdir -p /etc/docker',
    "cat > /etc/docker/daemon.json << 'EOF'",
    '{',
    '  "log-driver": "awslogs",',
    '  "log-opts": {',
    `    "awslogs-region": "${region}",`,
    `    "awslogs-group": "${logGroupName}",`,
    '    "tag": "{{.Name}}"',
    '  },',
    '  "icc": false,',
    '  "no-new-privileges": true,',
    '  "live-restore": true',
    '}',
    'EOF',
    'systemctl enable docker',
    'systemctl restart docker',
    '',
    `install -d -m 700 ${appDir} ${appDir}/data`,
    '',
    '# Render gateway env file from Secrets Manager',
    `cat > ${renderEnvScript} << 'SCRIPT'`,
    '#!/bin/bash',
    'set -euo pipefail',
    'umask 077',
    `aws secretsmanager get-secret-value --secret-id "${secretArn}" --region "${region}" \\`,
    '  --query SecretString --output text \\',
    `  | jq -r 'to_entries[] | "\\(.key)=\\(.value)"' > ${envFile}.tmp`,
    `mv ${envFile}.tmp ${envFile}`,
    'SCRIPT',
    `chmod 700 ${renderEnvScript}`,
    '',
    '# Gateway service',
    `cat > /etc/systemd/system/${projectName}.service << EOF`,
    '[Unit]',
    'Description=AI agent gateway container',
    'After=docker.service network-online.target',
    'Requires=docker.service',
    '',
    '[Service]',
    'Restart=always',
    'RestartSec=10',
    `ExecStartPre=${renderEnvScript}`,
    `ExecStartPre=-/usr/bin/docker rm -f ${projectName}`,
    `ExecStartPre=/usr/bin/docker pull ${gatewayImage}`,
    `ExecStart=/usr/bin/docker run --rm --name ${projectName} \\`,
    `  --env-file ${envFile} \\`,
    `  -p ${gatewayPort}:${gatewayPort} \\`,
    '  -v /var/run/docker.sock:/var/run/docker.sock \\',
    `  -v ${appDir}/data:/data \\`,
    `  ${gatewayImage}`,
    `ExecStop=/usr/bin/docker stop ${projectName}`,
    '',
    '[Install]',
    'WantedBy=multi-user.target',
    'EOF',
    '',
    'systemctl daemon-reload',
    `systemctl enable --now ${projectName}.service`,
    '',
    'echo "=== Bootstrap complete ==="',
  );

  return userData;
}
