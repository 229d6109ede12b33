/**
 * Default Threat Catalog
 *
 * Declarative rule table: adding a threat means adding a row. Row order
 * is the order signals are reported in and the last tie-break when
 * ranking top threats.
 */

import type { ThresholdRule } from './rule.js'

export const DEFAULT_CATALOG_VERSION = '2.1.0'

const TIERED_DEFAULT = { kind: 'tiered', low: 0.3, medium: 0.6, high: 0.9 } as const

export const DEFAULT_RULES: readonly ThresholdRule[] = [
  // ---------------------------------------------------------------------------
  // Privacy
  // ---------------------------------------------------------------------------
  {
    id: 'membership_inference_auc',
    threat: 'membership_inference',
    title: 'Membership Inference Attack',
    impacted_property: 'privacy',
    description:
      'An attacker could determine whether a specific record was part of the original training data by analyzing synthetic data characteristics.',
    metric: 'privacy_risk.membership_inference_auc',
    aliases: ['membership_inference_auc'],
    context: ['privacy_risk.membership_inference_accuracy'],
    priority: 90,
    predicate: { kind: 'gt', boundaries: { low: 0.55, medium: 0.6, high: 0.7 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 0.3 },
  },
  {
    id: 'record_linkage_nn_distance',
    threat: 'record_linkage',
    title: 'Record Linkage / Re-identification',
    impacted_property: 'privacy',
    description:
      'Synthetic records lying very close to original records could be linked back to individuals when combined with external quasi-identifiers.',
    metric: 'privacy_risk.min_nn_distance',
    aliases: ['min_nn_distance'],
    context: ['privacy_risk.avg_nn_distance'],
    priority: 85,
    predicate: { kind: 'lt', boundaries: { low: 1.0, medium: 0.5, high: 0.1 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 1.0 },
  },
  {
    id: 'near_duplicate_rate',
    threat: 'near_duplicate',
    title: 'Near-Duplicate Records',
    impacted_property: 'privacy',
    description:
      'A share of synthetic rows nearly copies original rows, leaking the underlying records verbatim.',
    metric: 'privacy_risk.near_duplicates_rate',
    aliases: ['near_duplicates_rate'],
    context: ['privacy_risk.near_duplicates_count'],
    priority: 80,
    predicate: { kind: 'gt', boundaries: { medium: 0.01, high: 0.02 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 0.03 },
  },
  {
    id: 'near_duplicate_count',
    threat: 'near_duplicate',
    title: 'Near-Duplicate Records',
    impacted_property: 'privacy',
    description:
      'Synthetic rows that nearly copy original rows were found; each one is a potential verbatim leak.',
    metric: 'privacy_risk.near_duplicates_count',
    aliases: ['near_duplicates_count'],
    priority: 80,
    predicate: { kind: 'gt', boundaries: { low: 0, medium: 5, high: 10 } },
    confidence: { kind: 'log', floor: 0.3, decades: 2 },
  },
  {
    id: 'attribute_inference_accuracy',
    threat: 'attribute_inference',
    title: 'Attribute Inference Attack',
    impacted_property: 'privacy',
    description:
      'Strong correlations in the synthetic data could let an attacker infer sensitive attributes from known quasi-identifiers.',
    metric: 'privacy_risk.attribute_inference_accuracy',
    aliases: ['attribute_inference_accuracy'],
    priority: 75,
    predicate: { kind: 'gt', boundaries: { low: 0.65, medium: 0.75, high: 0.85 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 0.25 },
  },
  {
    id: 'privacy_score',
    threat: 'privacy_leakage',
    title: 'General Privacy Leakage',
    impacted_property: 'privacy',
    description:
      'The overall privacy score indicates information leakage through record similarity, membership patterns or nearest-neighbour proximity.',
    metric: 'privacy_score',
    context: ['privacy_risk.leakage_risk_level'],
    priority: 70,
    predicate: { kind: 'lt', boundaries: { medium: 0.8, high: 0.6 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 0.4 },
  },
  {
    id: 'leakage_risk_level',
    threat: 'privacy_leakage',
    title: 'General Privacy Leakage',
    impacted_property: 'privacy',
    description: 'The upstream leakage assessment classified the dataset as leaking.',
    metric: 'privacy_risk.leakage_risk_level',
    aliases: ['leakage_risk_level'],
    priority: 70,
    predicate: { kind: 'categorical', categories: { medium: ['medium', 'moderate'], high: ['high', 'critical'] } },
    confidence: TIERED_DEFAULT,
  },

  // ---------------------------------------------------------------------------
  // Consistency
  // ---------------------------------------------------------------------------
  {
    id: 'semantic_violations',
    threat: 'schema_violation',
    title: 'Semantic Constraint Violation',
    impacted_property: 'consistency',
    description:
      'Records break domain rules or cross-field constraints, so the data does not respect real-world invariants and exposes generation artifacts.',
    metric: 'semantic_invariants.semantic_violations',
    aliases: ['semantic_violations'],
    context: ['semantic_invariants.field_constraint_violations', 'semantic_invariants.cross_field_violations'],
    priority: 60,
    predicate: { kind: 'gt', boundaries: { low: 0, medium: 10, high: 100 } },
    confidence: { kind: 'log', floor: 0.3, decades: 3 },
  },

  // ---------------------------------------------------------------------------
  // Utility
  // ---------------------------------------------------------------------------
  {
    id: 'drift_kl_divergence',
    threat: 'distribution_drift',
    title: 'Statistical Distribution Drift',
    impacted_property: 'utility',
    description:
      'Marginal distributions diverge from the original data, reducing the fidelity of anything learned from the synthetic set.',
    metric: 'statistical_fidelity.avg_kl_divergence',
    aliases: ['avg_kl_divergence'],
    context: ['statistical_fidelity.avg_wasserstein_distance', 'statistical_fidelity.avg_psi'],
    priority: 50,
    predicate: { kind: 'gt', boundaries: { low: 0.1, medium: 0.2, high: 0.5 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 0.5 },
  },
  {
    id: 'drift_category',
    threat: 'distribution_drift',
    title: 'Statistical Distribution Drift',
    impacted_property: 'utility',
    description: 'The upstream fidelity assessment classified the distribution drift as elevated.',
    metric: 'statistical_fidelity.statistical_drift',
    aliases: ['statistical_drift'],
    priority: 50,
    predicate: { kind: 'categorical', categories: { medium: ['moderate'], high: ['high', 'severe'] } },
    confidence: TIERED_DEFAULT,
  },
  {
    id: 'drift_variance_ratio',
    threat: 'distribution_drift',
    title: 'Statistical Distribution Drift',
    impacted_property: 'utility',
    description: 'Synthetic feature variance departs from the original, flattening or exaggerating spread.',
    metric: 'statistical_fidelity.variance_ratio',
    aliases: ['variance_ratio'],
    priority: 45,
    predicate: { kind: 'range', min: 0.8, max: 1.25, boundaries: { low: 0, medium: 0.2, high: 0.5 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 0.5 },
  },
  {
    id: 'correlation_frobenius_norm',
    threat: 'correlation_inconsistency',
    title: 'Correlation Structure Inconsistency',
    impacted_property: 'utility',
    description:
      'Correlation patterns diverge from the original data, compromising multivariate analyses and model performance.',
    metric: 'statistical_fidelity.correlation_frobenius_norm',
    aliases: ['correlation_frobenius_norm'],
    context: ['utility.feature_importance_correlation'],
    priority: 40,
    predicate: { kind: 'gt', boundaries: { low: 0.5, medium: 1.0, high: 2.0 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 2.0 },
  },
  {
    id: 'utility_score',
    threat: 'utility_degradation',
    title: 'ML Utility Degradation',
    impacted_property: 'utility',
    description:
      'Models trained on the synthetic data underperform models trained on real data, limiting its value for ML work.',
    metric: 'utility_score',
    context: ['utility.accuracy_gap', 'utility.synthetic_model_accuracy'],
    priority: 30,
    predicate: { kind: 'lt', boundaries: { medium: 0.85, high: 0.7 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 0.35 },
  },
]
