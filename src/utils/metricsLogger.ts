import log = require("loglevel");

/**
 * Legal types of metrics: https://docs.datadoghq.com/integrations/amazon_lambda/#using-cloudwatch-logs
 */
enum MetricsType {
    Histogram = "histogram",
    Count = "count"
}

export namespace MetricsLogger {

    export function discountRequirementCheck(ruleSystemName: string, isValid: boolean): void {
        logMetric(1, MetricsType.Histogram, "discountRules.requirements.check", {
            rule: ruleSystemName,
            valid: isValid + ""
        });
    }

    export function discountRequirementAborted(ruleSystemName: string): void {
        logMetric(1, MetricsType.Count, "discountRules.requirements.aborted", {rule: ruleSystemName});
    }

    export function discountRequirementsDeleted(ruleSystemName: string, count: number): void {
        logMetric(count, MetricsType.Count, "discountRules.requirements.deleted", {rule: ruleSystemName});
    }
}

/**
 * Uses Cloudwatch logs to send arbitrary metrics to Datadog: see https://docs.datadoghq.com/integrations/amazon_lambda/#using-cloudwatch-logs for details
 * Log message follows format `MONITORING|<unix_epoch_timestamp_in_seconds>|<value>|<metric_type>|<metric_name>|#<tag_key>:<tag_value>`
 * The tag function_name:<name_of_the_function> is added automatically
 */
function logMetric(value: number, metricType: MetricsType, metricName: string, tags: { [key: string]: string } = {}): void {
    const tagString = Object.keys(tags)
        .map(key => `#${key}:${tags[key]}`)
        .join(",");

    log.info(`MONITORING|` +
        `${Math.round(Date.now() / 1000)}|` +
        `${value}|` +
        `${metricType}|` +
        `${metricName}|` +
        `${tagString}`
    );
}
