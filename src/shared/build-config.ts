/**
 * Build configuration and template variables
 * Single source of truth for the provisioner's identity
 */

export const templateVars = {
  EXEC_NAME: "tf-provision",
  SERVICE_NAME: "tf-native-provisioner",
  DISPLAY_NAME: "libtensorflow native provisioner",
};

export const buildConfig = {
  serviceName: templateVars.SERVICE_NAME,
  displayName: templateVars.DISPLAY_NAME,
  version: "0.3.0",
  execName: templateVars.EXEC_NAME,
};
