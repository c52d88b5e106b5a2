/**
 * Every alert `opsctl assist` knows about, in help order.
 */

import { clusterMonitoringAlert } from "./cluster-monitoring";
import { clusterProvisioningAlert } from "./cluster-provisioning";
import { dynatraceAlert } from "./dynatrace";
import { pruningCronjobAlert } from "./pruning-cronjob";
import type { AlertDefinition } from "../types";

export const ALERTS: readonly AlertDefinition[] = [
  clusterMonitoringAlert,
  clusterProvisioningAlert,
  dynatraceAlert,
  pruningCronjobAlert,
];

export {
  clusterMonitoringAlert,
  clusterProvisioningAlert,
  dynatraceAlert,
  pruningCronjobAlert,
};
